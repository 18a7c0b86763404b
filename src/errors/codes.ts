export type ValidationErrorCode =
  | "ERR_VALIDATION_CONFIG"
  | "ERR_VALIDATION_CIDR"
  | "ERR_VALIDATION_IP"
  | "ERR_VALIDATION_MAC"
  | "ERR_VALIDATION_VM_NAME"
  | "ERR_VALIDATION_RESERVATION"
  | "ERR_VALIDATION_INTEGER"
  | "ERR_VALIDATION_FLAGS";

export type ImageErrorCode =
  | "ERR_IMAGE_SOURCE_NOT_FOUND"
  | "ERR_IMAGE_BASE_NOT_FOUND"
  | "ERR_IMAGE_OVERLAY_FAILED"
  | "ERR_IMAGE_CUSTOMIZE_FAILED";

export type NetworkErrorCode = "ERR_NETWORK_NOT_DEFINED" | "ERR_NETWORK_NOT_ACTIVE";

export type VmErrorCode = "ERR_VM_DESCRIPTOR_NOT_FOUND";

export type ControlPlaneErrorCode = "ERR_CONTROL_PLANE_COMMAND" | "ERR_CONTROL_PLANE_OUTPUT";

export type TimeoutErrorCode = "ERR_TIMEOUT_COMMAND" | "ERR_TIMEOUT_LOCK";

export type SetupErrorCode = "ERR_SETUP_PRIVILEGES" | "ERR_SETUP_MISSING_BINARY";

export type HostsErrorCode = "ERR_HOSTS_LOCAL_NOT_FOUND" | "ERR_HOSTS_ALREADY_PRESENT";

export type LabErrorCode =
  | ValidationErrorCode
  | ImageErrorCode
  | NetworkErrorCode
  | VmErrorCode
  | ControlPlaneErrorCode
  | TimeoutErrorCode
  | SetupErrorCode
  | HostsErrorCode;
