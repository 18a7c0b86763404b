import { existsSync } from "node:fs";
import { chmod, copyFile, mkdir, rm, unlink, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { LabContext } from "../context.ts";
import { safeHook } from "../hooks.ts";
import { sourceImageNotFoundError, baseImageNotFoundError } from "../errors/index.ts";
import { renderGuestHosts } from "../lib/hosts-file.ts";
import type { VMSpec } from "../lib/lab-spec.ts";

export interface BaseImageResult {
  path: string;
  action: "copied" | "present";
}

export interface OverlayResult {
  vmName: string;
  path: string;
  action: "created" | "recreated" | "kept";
}

/**
 * Base image and per-VM overlay files. Works on the filesystem and the image
 * tools only; never talks to the control plane.
 */
export class ImageManager {
  private readonly log: LabContext["logger"];

  constructor(private readonly ctx: LabContext) {
    this.log = ctx.logger.withTag("image");
  }

  /** Copy the source image into managed storage once; later runs leave it alone. */
  async ensureBaseImage(
    src: string = this.ctx.spec.baseImageSource,
    dest: string = this.ctx.spec.baseImagePath,
  ): Promise<BaseImageResult> {
    if (!existsSync(src)) throw sourceImageNotFoundError(src);

    let result: BaseImageResult;
    if (existsSync(dest)) {
      this.log.info(`Base image already present: ${dest}`);
      result = { path: dest, action: "present" };
    } else {
      this.log.start(`Copying base image to ${dest}`);
      await mkdir(dirname(dest), { recursive: true });
      await copyFile(src, dest);
      await this.normalize(dest);
      this.log.success(`Base image copied: ${dest}`);
      result = { path: dest, action: "copied" };
    }

    await safeHook(this.log, "image:baseReady", this.ctx.hooks.callHook("image:baseReady", result));
    return result;
  }

  async createOverlay(vm: VMSpec): Promise<OverlayResult> {
    if (!existsSync(vm.baseImagePath)) throw baseImageNotFoundError(vm.baseImagePath);

    let action: OverlayResult["action"] = "created";
    if (existsSync(vm.overlayPath)) {
      this.log.warn(`Overlay image already exists: ${vm.overlayPath}`);
      const overwrite = await this.ctx.confirm({
        kind: "overlay-overwrite",
        target: vm.overlayPath,
        message: `Overwrite overlay for ${vm.name}? Its disk contents will be lost.`,
      });
      if (!overwrite) {
        this.log.info(`Keeping existing overlay for ${vm.name}`);
        return this.overlayReady({ vmName: vm.name, path: vm.overlayPath, action: "kept" });
      }
      await unlink(vm.overlayPath);
      action = "recreated";
    }

    this.log.start(`Creating overlay image for ${vm.name}`);
    await mkdir(dirname(vm.overlayPath), { recursive: true });
    await rm(this.customizedMarker(vm), { force: true });
    await this.ctx.imageTool.createOverlay(vm.baseImagePath, vm.overlayPath);
    await this.normalize(vm.overlayPath);
    this.log.success(`Created: ${vm.overlayPath}`);
    return this.overlayReady({ vmName: vm.name, path: vm.overlayPath, action });
  }

  /** Hostname, locale, user, sudo and /etc/hosts inside the guest disk. */
  async customizeOverlay(vm: VMSpec): Promise<void> {
    const { spec } = this.ctx;
    this.log.start(`Customizing ${vm.name} (${vm.fqdn}, user ${spec.guest.user})`);
    await this.ctx.customization.apply(vm.overlayPath, {
      fqdn: vm.fqdn,
      guest: spec.guest,
      hostsContent: renderGuestHosts(spec.network.reservations),
    });
    await this.normalize(vm.overlayPath);
    await writeFile(this.customizedMarker(vm), `${vm.fqdn}\n`);
    this.log.success(`Customization complete for ${vm.name}`);
    await safeHook(
      this.log,
      "image:customized",
      this.ctx.hooks.callHook("image:customized", { vmName: vm.name, path: vm.overlayPath }),
    );
  }

  /** True once customization of the current overlay has completed. */
  isCustomized(vm: VMSpec): boolean {
    return existsSync(vm.overlayPath) && existsSync(this.customizedMarker(vm));
  }

  /** Remove the managed per-run directory. The base image beside it is kept. */
  async removeOverlayStorage(dir: string = this.ctx.spec.paths.labDir): Promise<boolean> {
    if (!existsSync(dir)) return false;
    await rm(dir, { recursive: true, force: true });
    this.log.info(`Removed ${dir}`);
    return true;
  }

  /** Written after a successful customization, removed whenever the overlay is (re)created. */
  private customizedMarker(vm: VMSpec): string {
    return join(dirname(vm.overlayPath), `.${vm.name}.customized`);
  }

  private async overlayReady(result: OverlayResult): Promise<OverlayResult> {
    await safeHook(this.log, "image:overlayReady", this.ctx.hooks.callHook("image:overlayReady", result));
    return result;
  }

  private async normalize(path: string): Promise<void> {
    const { ownership, timeouts } = this.ctx.spec;
    if (ownership) {
      await this.ctx.exec("chown", [`${ownership.user}:${ownership.group}`, path], {
        timeoutMs: timeouts.controlPlaneMs,
      });
    }
    await chmod(path, 0o644);
  }
}
