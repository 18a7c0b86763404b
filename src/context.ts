import { createHooks, type Hookable } from "hookable";
import type { LabHooks } from "./hooks.ts";
import type { LabPlugin } from "./plugin.ts";
import { createDefaultLogger, type LabLogger } from "./lab-logger.ts";
import { labPaths, resolveConfigPath, type LabPaths } from "./paths.ts";
import { denyAll, type Confirm } from "./lib/confirm.ts";
import { defaultExec, type ExecFn } from "./lib/exec.ts";
import { loadLabConfig, type LabConfig } from "./lib/lab-config.ts";
import { resolveLabSpec, type LabSpec } from "./lib/lab-spec.ts";
import { VirshControlPlane, type ControlPlaneClient } from "./services/control-plane.ts";
import { VirtCustomizeTool, type CustomizationTool } from "./services/customization.ts";
import { QemuImageTool, type ImageTool } from "./services/image-tool.ts";
import { Reconciler } from "./services/reconciler.ts";

export interface LabOptions {
  /** Config file; defaults to $KVMLAB_CONFIG or ./lab.config.json */
  configPath?: string;
  /** Use this configuration instead of reading the file */
  config?: LabConfig;
  paths?: LabPaths;
  hostsFile?: string;
  controlPlane?: ControlPlaneClient;
  imageTool?: ImageTool;
  customization?: CustomizationTool;
  /** Runner for the external tools the default collaborators (and chown) use */
  exec?: ExecFn;
  /** Decides destructive steps; defaults to declining every one */
  confirm?: Confirm;
  logger?: LabLogger;
  plugins?: LabPlugin[];
}

export interface LabContext {
  readonly spec: LabSpec;
  readonly controlPlane: ControlPlaneClient;
  readonly imageTool: ImageTool;
  readonly customization: CustomizationTool;
  readonly exec: ExecFn;
  readonly confirm: Confirm;
  readonly hooks: Hookable<LabHooks>;
  readonly logger: LabLogger;
}

export async function createLab(options: LabOptions = {}): Promise<Reconciler> {
  const configFile = resolveConfigPath(options.configPath);
  const config = options.config ?? loadLabConfig(options.configPath).config;
  const paths =
    options.paths ??
    labPaths({
      configFile,
      imagesDir: config.imagesDir,
      labDirName: config.labDirName,
      hostsFile: options.hostsFile,
    });
  const spec = resolveLabSpec(config, paths);

  const exec = options.exec ?? defaultExec;
  const ctx: LabContext = {
    spec,
    controlPlane:
      options.controlPlane ?? new VirshControlPlane({ exec, timeoutMs: spec.timeouts.controlPlaneMs }),
    imageTool: options.imageTool ?? new QemuImageTool({ exec, timeoutMs: spec.timeouts.imageMs }),
    customization:
      options.customization ?? new VirtCustomizeTool({ exec, timeoutMs: spec.timeouts.customizeMs }),
    exec,
    confirm: options.confirm ?? denyAll,
    hooks: createHooks<LabHooks>(),
    logger: options.logger ?? createDefaultLogger(),
  };
  const lab = new Reconciler(ctx);

  if (options.plugins) {
    for (const plugin of options.plugins) {
      await plugin.setup(ctx);
    }
  }

  return lab;
}
