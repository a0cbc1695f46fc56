import type { LogSink } from "./logger.js";

export type PrintOptions = {
  sortKeys?: boolean;
  sink?: LogSink;
};

export function printJson(data: unknown, options: PrintOptions = {}): void {
  const sink: LogSink = options.sink ?? process.stdout;
  sink.write(`${renderJson(data, options.sortKeys ?? false)}\n`);
}

export function renderJson(data: unknown, sortKeys: boolean): string {
  return JSON.stringify(sortKeys ? sortKeysDeep(data) : data, null, 2);
}

export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (!isPlainObject(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeysDeep(value[key]);
  }
  return sorted;
}

function isPlainObject(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}
