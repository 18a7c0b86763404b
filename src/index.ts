// Package entry point — re-exports public API.

// Building blocks
export { createLab } from "./context.ts";
export type { LabContext, LabOptions } from "./context.ts";
export type { LabHooks } from "./hooks.ts";
export { definePlugin } from "./plugin.ts";
export type { LabPlugin } from "./plugin.ts";
export type { LabLogger, LogLevel, LogRecord, MemoryLogger } from "./lab-logger.ts";
export { createDefaultLogger, createSilentLogger, createMemoryLogger } from "./lab-logger.ts";

export { labPaths, resolveConfigPath } from "./paths.ts";
export type { LabPaths } from "./paths.ts";

export { DEFAULT_LAB_CONFIG, loadLabConfig, parseLabConfig } from "./lib/lab-config.ts";
export type { LabConfig, LoadedLabConfig, NetworkConfig, VmConfig, GuestConfig } from "./lib/lab-config.ts";
export { resolveLabSpec, domainUuid } from "./lib/lab-spec.ts";
export type { LabSpec, VMSpec, NetworkSpec, Reservation, GuestSpec, Ownership } from "./lib/lab-spec.ts";
export { buildReservationTable, ipAddressFor, macAddressFor } from "./lib/reservations.ts";
export { parseSubnet, parseIpv4, formatIpv4 } from "./lib/ipv4.ts";
export type { Subnet } from "./lib/ipv4.ts";

export { allowAll, denyAll, createInteractiveConfirm } from "./lib/confirm.ts";
export type { Confirm, ConfirmKind, ConfirmRequest } from "./lib/confirm.ts";
export { defaultExec, DEFAULT_COMMAND_TIMEOUT_MS } from "./lib/exec.ts";
export type { ExecFn, ExecOptions, ExecResult } from "./lib/exec.ts";
export { assertPrivileges, checkDependencies, REQUIRED_TOOLS } from "./lib/environment.ts";
export { FileLock } from "./lib/file-lock.ts";
export {
  addHostsEntries,
  removeHostsEntries,
  updateHostsEntries,
  hostsStatus,
  renderGuestHosts,
  renderHostsLocal,
} from "./lib/hosts-file.ts";
export type { HostsChange, HostsFiles, HostsStatus } from "./lib/hosts-file.ts";
export { table, toError } from "./lib/utils.ts";
export type { TableColumn } from "./lib/utils.ts";

export { VirshControlPlane, MUTATING_OPERATIONS } from "./services/control-plane.ts";
export type {
  ControlPlaneClient,
  DomainState,
  NetworkState,
  DhcpLease,
  MutatingOperation,
} from "./services/control-plane.ts";
export { MemoryControlPlane } from "./stores/memory.ts";
export type { ControlPlaneCall } from "./stores/memory.ts";
export { QemuImageTool } from "./services/image-tool.ts";
export type { ImageTool } from "./services/image-tool.ts";
export { VirtCustomizeTool, customizeArgs } from "./services/customization.ts";
export type { CustomizationTool, CustomizationSpec } from "./services/customization.ts";
export { renderDomain, renderNetwork, escapeXml } from "./services/descriptor.ts";
export { ImageManager } from "./services/image.ts";
export type { BaseImageResult, OverlayResult } from "./services/image.ts";
export { NetworkManager } from "./services/network.ts";
export type { NetworkResult, TeardownResult } from "./services/network.ts";
export { VmController } from "./services/vm.ts";
export type { VmTransition, DescriptorResult, TransitionAction } from "./services/vm.ts";
export { Reconciler } from "./services/reconciler.ts";
export type {
  CreateOptions,
  CreateReport,
  StartReport,
  ResetOptions,
  ResetReport,
  ResetScope,
  ResetStep,
  ResetStepName,
  StatusReport,
  VmStatus,
  Workflow,
} from "./services/reconciler.ts";

export { LabError } from "./errors/index.ts";
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
} from "./errors/index.ts";
export {
  formatCommandError,
  handleCommandError,
  ValidationError,
  ImageError,
  NetworkError,
  VmError,
  ControlPlaneError,
  TimeoutError,
  SetupError,
  HostsError,
} from "./errors/index.ts";

export {
  initLabLogger,
  createCommandLogger,
  createScopedLogger,
  getOutputMode,
} from "./lib/logger/index.ts";
export type { OutputMode, CommandLogger } from "./lib/logger/index.ts";
