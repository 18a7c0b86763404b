import type { ErrorOptions } from "evlog";
import type { ValidationErrorCode } from "./codes.ts";
import { LabError } from "./base.ts";

export class ValidationError extends LabError {
  readonly field?: string;

  constructor(code: ValidationErrorCode, options: ErrorOptions & { field?: string }) {
    super(code, options);
    this.name = "ValidationError";
    this.field = options.field;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.field !== undefined && { field: this.field }) };
  }
}

export const invalidConfigFileError = (path: string, detail: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_CONFIG", {
    message: `Invalid lab configuration in ${path}: ${detail}`,
    fix: "The file must contain a JSON object. See lab.config.json for the full shape.",
  });

export const invalidConfigValueError = (field: string, detail: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_CONFIG", {
    field,
    message: `Invalid configuration value "${field}": ${detail}`,
  });

export const invalidIntegerError = (
  field: string,
  value: unknown,
  min: number,
  max: number,
): ValidationError =>
  new ValidationError("ERR_VALIDATION_INTEGER", {
    field,
    message: `Invalid ${field}: "${String(value)}". Must be an integer between ${min} and ${max}.`,
  });

export const invalidCidrFormatError = (cidr: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_CIDR", {
    field: "network.subnet",
    message: `Invalid CIDR format: "${cidr}". Expected format: x.x.x.x/y`,
  });

export const invalidCidrPrefixError = (cidr: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_CIDR", {
    field: "network.subnet",
    message: `Invalid CIDR prefix length: "${cidr}". Must be 8-30.`,
  });

export const invalidIpAddressError = (field: string, ip: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_IP", {
    field,
    message: `Invalid IPv4 address for ${field}: "${ip}"`,
  });

export const ipOutsideSubnetError = (field: string, ip: string, cidr: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_IP", {
    field,
    message: `${field} ${ip} is not a host address inside ${cidr}`,
  });

export const gatewayInDhcpRangeError = (gateway: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_IP", {
    field: "network.gateway",
    message: `Gateway ${gateway} falls inside the DHCP range`,
    fix: "Move the DHCP range so it excludes the gateway address.",
  });

export const invalidMacError = (field: string, mac: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_MAC", {
    field,
    message: `Invalid MAC address for ${field}: "${mac}"`,
  });

export const invalidVmNameError = (name: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_VM_NAME", {
    field: "vms",
    message: `Invalid VM name: "${name}". Use letters, digits, "-" and "_" (max 63 characters).`,
  });

export const duplicateReservationError = (
  kind: "name" | "ip" | "mac",
  value: string,
): ValidationError =>
  new ValidationError("ERR_VALIDATION_RESERVATION", {
    field: "vms",
    message: `Duplicate VM ${kind} in reservation table: ${value}`,
    why: "Each VM needs its own name, MAC and IP so DHCP reservations stay one-to-one.",
  });

export const gatewayReservedError = (vmName: string, gateway: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_RESERVATION", {
    field: "vms",
    message: `VM ${vmName} is assigned the gateway address ${gateway}`,
  });

export const mutuallyExclusiveFlagsError = (flagA: string, flagB: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_FLAGS", {
    message: `Cannot use ${flagA} and ${flagB} together`,
    why: "They are mutually exclusive.",
    fix: `Use either ${flagA} or ${flagB}, not both.`,
  });
