import { stripAnsi } from "consola/utils";

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface TableColumn<T> {
  title: string;
  value: (row: T) => string | number;
  /** Decorates the cell text (ANSI colours); widths are measured without escapes */
  style?: (text: string, row: T) => string;
}

/** Plain-text table with a bold header and columns padded to their widest cell. */
export function table<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  const width = (text: string) => stripAnsi(text).length;
  const cells = rows.map((row) =>
    columns.map((column) => {
      const text = String(column.value(row));
      return column.style ? column.style(text, row) : text;
    }),
  );
  const widths = columns.map((column, i) =>
    Math.max(width(column.title), ...cells.map((line) => width(line[i]))),
  );
  const pad = (text: string, i: number) => text + " ".repeat(Math.max(0, widths[i] - width(text)));

  const sep = "   ";
  return [
    `\x1b[1m${columns.map((column, i) => pad(column.title, i)).join(sep)}\x1b[0m`,
    ...cells.map((line) => line.map(pad).join(sep)),
  ].join("\n");
}
