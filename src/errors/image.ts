import type { ErrorOptions } from "evlog";
import type { ImageErrorCode } from "./codes.ts";
import { LabError } from "./base.ts";

export class ImageError extends LabError {
  readonly path?: string;

  constructor(code: ImageErrorCode, options: ErrorOptions & { path?: string }) {
    super(code, options);
    this.name = "ImageError";
    this.path = options.path;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.path !== undefined && { path: this.path }) };
  }
}

export const sourceImageNotFoundError = (path: string): ImageError =>
  new ImageError("ERR_IMAGE_SOURCE_NOT_FOUND", {
    path,
    message: `Source base image not found: ${path}`,
    fix: "Place the base qcow2 image at this path or set baseImage in lab.config.json.",
  });

export const baseImageNotFoundError = (path: string): ImageError =>
  new ImageError("ERR_IMAGE_BASE_NOT_FOUND", {
    path,
    message: `Base image not found in managed storage: ${path}`,
    fix: "Run 'kvmlab create' so the base image is copied into place first.",
  });

export const overlayCreateError = (path: string, detail: string): ImageError =>
  new ImageError("ERR_IMAGE_OVERLAY_FAILED", {
    path,
    message: `Failed to create overlay image ${path}: ${detail}`,
  });

export const customizeFailedError = (path: string, detail: string): ImageError =>
  new ImageError("ERR_IMAGE_CUSTOMIZE_FAILED", {
    path,
    message: `Guest customization failed for ${path}: ${detail}`,
    why: "virt-customize applies all changes or none; the overlay may be left uncustomized.",
    fix: "Re-run 'kvmlab create --yes' to recreate and customize the overlay.",
  });
