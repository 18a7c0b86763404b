export type {
  LabErrorCode,
  ValidationErrorCode,
  ImageErrorCode,
  NetworkErrorCode,
  VmErrorCode,
  ControlPlaneErrorCode,
  TimeoutErrorCode,
  SetupErrorCode,
  HostsErrorCode,
} from "./codes.ts";

export { LabError } from "./base.ts";

export { ValidationError } from "./validation.ts";
export {
  invalidConfigFileError,
  invalidConfigValueError,
  invalidIntegerError,
  invalidCidrFormatError,
  invalidCidrPrefixError,
  invalidIpAddressError,
  ipOutsideSubnetError,
  gatewayInDhcpRangeError,
  invalidMacError,
  invalidVmNameError,
  duplicateReservationError,
  gatewayReservedError,
  mutuallyExclusiveFlagsError,
} from "./validation.ts";

export { ImageError } from "./image.ts";
export {
  sourceImageNotFoundError,
  baseImageNotFoundError,
  overlayCreateError,
  customizeFailedError,
} from "./image.ts";

export { NetworkError } from "./network.ts";
export { networkNotDefinedError, networkNotActiveError } from "./network.ts";

export { VmError } from "./vm.ts";
export { descriptorNotFoundError } from "./vm.ts";

export { ControlPlaneError } from "./control-plane.ts";
export { commandFailedError, unexpectedOutputError } from "./control-plane.ts";

export { TimeoutError } from "./timeout.ts";
export { commandTimeoutError, lockTimeoutError } from "./timeout.ts";

export { SetupError } from "./setup.ts";
export { privilegesRequiredError, missingBinaryError } from "./setup.ts";

export { HostsError } from "./hosts.ts";
export { hostsLocalNotFoundError, hostsEntriesPresentError } from "./hosts.ts";

export { formatCommandError, handleCommandError } from "./display.ts";
