import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLab } from "../../src/context.ts";
import { baseImageNotFoundError } from "../../src/errors/index.ts";
import { createMemoryLogger, type MemoryLogger } from "../../src/lab-logger.ts";
import type { Confirm, ConfirmRequest } from "../../src/lib/confirm.ts";
import type { ExecFn } from "../../src/lib/exec.ts";
import { DEFAULT_LAB_CONFIG, type LabConfig } from "../../src/lib/lab-config.ts";
import { labPaths, type LabPaths } from "../../src/paths.ts";
import type { CustomizationSpec, CustomizationTool } from "../../src/services/customization.ts";
import type { ImageTool } from "../../src/services/image-tool.ts";
import type { LabPlugin } from "../../src/plugin.ts";
import type { Reconciler } from "../../src/services/reconciler.ts";
import { MemoryControlPlane } from "../../src/stores/memory.ts";

export const BASE_IMAGE_CONTENT = "base-image-bytes";

/** Writes a small text file standing in for a qcow2 child of `basePath`. */
export class FakeImageTool implements ImageTool {
  readonly calls: { basePath: string; overlayPath: string }[] = [];

  async createOverlay(basePath: string, overlayPath: string): Promise<void> {
    this.calls.push({ basePath, overlayPath });
    if (!existsSync(basePath)) throw baseImageNotFoundError(basePath);
    writeFileSync(overlayPath, `overlay backed by ${basePath}\n`);
  }
}

export class FakeCustomization implements CustomizationTool {
  readonly calls: { diskPath: string; spec: CustomizationSpec }[] = [];
  failWith: Error | null = null;

  async apply(diskPath: string, spec: CustomizationSpec): Promise<void> {
    this.calls.push({ diskPath, spec });
    if (this.failWith) throw this.failWith;
  }
}

export interface RecordingConfirm {
  confirm: Confirm;
  requests: ConfirmRequest[];
}

export function recordingConfirm(answer: boolean | ((request: ConfirmRequest) => boolean)): RecordingConfirm {
  const requests: ConfirmRequest[] = [];
  return {
    requests,
    confirm: async (request) => {
      requests.push(request);
      return typeof answer === "function" ? answer(request) : answer;
    },
  };
}

export interface LabFixture {
  root: string;
  paths: LabPaths;
  config: LabConfig;
  sourceImage: string;
  controlPlane: MemoryControlPlane;
  imageTool: FakeImageTool;
  customization: FakeCustomization;
  logger: MemoryLogger;
  execCalls: { bin: string; args: string[] }[];
  confirmRequests: ConfirmRequest[];
  lab: Reconciler;
  cleanup: () => void;
}

export interface FixtureOptions {
  confirm?: boolean | ((request: ConfirmRequest) => boolean);
  /** Write the source image (default true) */
  withSourceImage?: boolean;
  controlPlane?: MemoryControlPlane;
  plugins?: LabPlugin[];
}

export function tempDir(prefix = "kvmlab-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export async function createFixture(options: FixtureOptions = {}): Promise<LabFixture> {
  const root = tempDir();
  const sourceDir = join(root, "source");
  mkdirSync(sourceDir, { recursive: true });
  const sourceImage = join(sourceDir, "Fedora43Lab.qcow2");
  if (options.withSourceImage ?? true) writeFileSync(sourceImage, BASE_IMAGE_CONTENT);

  const config: LabConfig = {
    ...structuredClone(DEFAULT_LAB_CONFIG),
    baseImage: sourceImage,
    imagesDir: join(root, "images"),
    ownership: null,
  };
  const paths = labPaths({
    configFile: join(root, "lab.config.json"),
    imagesDir: config.imagesDir,
    labDirName: config.labDirName,
    hostsFile: join(root, "etc-hosts"),
  });

  const controlPlane = options.controlPlane ?? new MemoryControlPlane();
  const imageTool = new FakeImageTool();
  const customization = new FakeCustomization();
  const logger = createMemoryLogger();
  const execCalls: { bin: string; args: string[] }[] = [];
  const exec: ExecFn = async (bin, args) => {
    execCalls.push({ bin, args });
    return { stdout: "", stderr: "" };
  };
  const { confirm, requests } = recordingConfirm(options.confirm ?? false);

  const lab = await createLab({
    config,
    paths,
    controlPlane,
    imageTool,
    customization,
    exec,
    confirm,
    logger,
    plugins: options.plugins,
  });

  return {
    root,
    paths,
    config,
    sourceImage,
    controlPlane,
    imageTool,
    customization,
    logger,
    execCalls,
    confirmRequests: requests,
    lab,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}
