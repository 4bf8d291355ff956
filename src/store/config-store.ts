/**
 * Key-value settings store
 * The monitor only reads DEVELOPER_MODE and the mount path keys, and writes
 * the last auto-detected path.
 */

import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { createLogger } from "../logger";

export type ConfigValue = string | number | boolean | null;

export interface ConfigStore {
  get(key: string): ConfigValue | undefined;
  set(key: string, value: ConfigValue): void;
}

const log = createLogger("ConfigStore");

export function getString(store: ConfigStore, key: string, defaultValue = ""): string {
  const value = store.get(key);
  return typeof value === "string" ? value : defaultValue;
}

/**
 * Booleans may have been saved as strings by older settings pages
 */
export function getBoolean(store: ConfigStore, key: string, defaultValue = false): boolean {
  const value = store.get(key);
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lower = value.toLowerCase();
    if (lower === "true" || lower === "1") return true;
    if (lower === "false" || lower === "0" || lower === "") return false;
  }
  if (typeof value === "number") return value !== 0;
  return defaultValue;
}

function isConfigValue(value: unknown): value is ConfigValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * In-memory store (tests, or running without a settings file)
 */
export class MemoryConfigStore implements ConfigStore {
  protected values = new Map<string, ConfigValue>();
  public writes: Array<[string, ConfigValue]> = [];

  constructor(initial: Record<string, ConfigValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  get(key: string): ConfigValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: ConfigValue): void {
    this.values.set(key, value);
    this.writes.push([key, value]);
  }

  toJSON(): Record<string, ConfigValue> {
    return Object.fromEntries(this.values);
  }
}

/**
 * Settings persisted as a flat JSON object. The file is the source of truth:
 * every get re-reads it and every set is a read-modify-write, so edits made
 * while the monitor runs are seen and kept. Non-scalar entries written by
 * other parts of the app are preserved on save.
 */
export class JsonConfigStore implements ConfigStore {
  private data: Record<string, unknown> = {};

  constructor(private filePath: string) {
    this.reload();
  }

  get path(): string {
    return this.filePath;
  }

  reload(): void {
    let text: string;
    try {
      text = readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.data = {};
        return;
      }
      log.warn(`Cannot read ${this.filePath}, starting empty:`, err);
      this.data = {};
      return;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      this.data = typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
        ? { ...parsed }
        : {};
    } catch (err) {
      log.warn(`Malformed settings in ${this.filePath}, starting empty:`, err);
      this.data = {};
    }
  }

  get(key: string): ConfigValue | undefined {
    this.reload();
    const value = this.data[key];
    return isConfigValue(value) ? value : undefined;
  }

  set(key: string, value: ConfigValue): void {
    this.reload();
    this.data[key] = value;
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(this.data, null, 4));
  }
}
