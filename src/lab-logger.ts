import { consola, type ConsolaInstance } from "consola";

export interface LabLogger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  success: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  start: (...args: unknown[]) => void;
  withTag: (tag: string) => LabLogger;
}

export function createDefaultLogger(): LabLogger {
  return wrapConsola(consola);
}

function wrapConsola(instance: ConsolaInstance): LabLogger {
  return {
    debug: instance.debug.bind(instance),
    info: instance.info.bind(instance),
    success: instance.success.bind(instance),
    warn: instance.warn.bind(instance),
    error: instance.error.bind(instance),
    start: instance.start.bind(instance),
    withTag: (tag: string) => wrapConsola(instance.withTag(tag)),
  };
}

const noop = (): void => {};

export function createSilentLogger(): LabLogger {
  const silent: LabLogger = {
    debug: noop,
    info: noop,
    success: noop,
    warn: noop,
    error: noop,
    start: noop,
    withTag: () => silent,
  };
  return silent;
}

export type LogLevel = "debug" | "info" | "success" | "warn" | "error" | "start";

export interface LogRecord {
  level: LogLevel;
  tag: string | null;
  message: string;
}

export interface MemoryLogger extends LabLogger {
  readonly records: LogRecord[];
}

/**
 * Logger that keeps every line in `records` instead of printing.
 * Tagged children share the parent's record list.
 */
export function createMemoryLogger(records: LogRecord[] = [], tag: string | null = null): MemoryLogger {
  const push =
    (level: LogLevel) =>
    (...args: unknown[]): void => {
      records.push({ level, tag, message: args.map(String).join(" ") });
    };

  return {
    records,
    debug: push("debug"),
    info: push("info"),
    success: push("success"),
    warn: push("warn"),
    error: push("error"),
    start: push("start"),
    withTag: (child: string) => createMemoryLogger(records, tag ? `${tag}:${child}` : child),
  };
}
