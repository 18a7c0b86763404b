import { dirname, join, resolve } from "node:path";

export const DEFAULT_CONFIG_FILE = "lab.config.json";
export const DEFAULT_HOSTS_FILE = "/etc/hosts";

export interface LabPaths {
  /** Directory holding the config file; relative paths resolve against it */
  configDir: string;
  /** libvirt storage directory; the managed base image lives here */
  imagesDir: string;
  /** Managed root for per-run artifacts (overlays, descriptors); removed by reset */
  labDir: string;
  lockFile: string;
  hostsLocal: string;
  hostsFile: string;
}

/**
 * Locate the lab configuration file.
 * Priority: explicit path > $KVMLAB_CONFIG > ./lab.config.json
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return resolve(explicit);
  if (env.KVMLAB_CONFIG) return resolve(env.KVMLAB_CONFIG);
  return resolve(DEFAULT_CONFIG_FILE);
}

export function labPaths(options: {
  configFile: string;
  imagesDir: string;
  labDirName: string;
  hostsFile?: string;
}): LabPaths {
  const configDir = dirname(options.configFile);
  const imagesDir = resolve(configDir, options.imagesDir);
  return {
    configDir,
    imagesDir,
    labDir: join(imagesDir, options.labDirName),
    lockFile: join(imagesDir, ".kvmlab.lock"),
    hostsLocal: join(configDir, "hosts.local"),
    hostsFile: options.hostsFile ?? DEFAULT_HOSTS_FILE,
  };
}
