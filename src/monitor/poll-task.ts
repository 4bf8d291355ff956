/**
 * Mount path polling
 * After a storage-mode connect the volume can take seconds to appear. A
 * PollTask retries the lookup on a fixed interval until the mount shows up,
 * the device goes away, or the attempts run out.
 */

import { setTimeout as sleep } from "timers/promises";
import type { DeviceKind } from "../devices/catalog";
import type { MountResult } from "../mount/resolver";
import type { StatusRegistry } from "../state/registry";
import type { DeviceStatus } from "../state/types";
import { createLogger } from "../logger";

export interface MountLocator {
  findMount(kind: DeviceKind): Promise<MountResult | null>;
}

/**
 * - found: mount located and applied
 * - abandoned: device disconnected or a path was set elsewhere
 * - stopped: stop() was called
 * - timeout: maxAttempts exhausted
 */
export type PollOutcome = "found" | "abandoned" | "stopped" | "timeout";

export interface PollTaskOptions {
  kind: DeviceKind;
  registry: StatusRegistry;
  resolver: MountLocator;
  /** Applies a found mount (status update + broadcast) */
  apply: (status: DeviceStatus) => void;
  maxAttempts?: number;
  intervalMs?: number;
}

const log = createLogger("PollTask");

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export class PollTask {
  readonly kind: DeviceKind;
  readonly maxAttempts: number;
  readonly intervalMs: number;
  private registry: StatusRegistry;
  private resolver: MountLocator;
  private apply: (status: DeviceStatus) => void;
  private controller = new AbortController();
  private result: Promise<PollOutcome> | null = null;
  private finished = false;
  public attempts = 0;

  constructor(options: PollTaskOptions) {
    this.kind = options.kind;
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.apply = options.apply;
    this.maxAttempts = options.maxAttempts ?? 30;
    this.intervalMs = options.intervalMs ?? 1000;
  }

  get running(): boolean {
    return this.result !== null && !this.finished;
  }

  /**
   * Settles with the outcome once the task ends
   */
  get done(): Promise<PollOutcome> {
    return this.result ?? Promise.resolve("stopped");
  }

  start(): Promise<PollOutcome> {
    if (!this.result) {
      this.result = this.run().finally(() => {
        this.finished = true;
      });
    }
    return this.result;
  }

  /**
   * Interrupts the current wait; the task ends without touching status
   */
  stop(): void {
    this.controller.abort();
  }

  /**
   * Still connected and no path yet
   */
  private stillWaiting(): boolean {
    const status = this.registry.read(this.kind.id);
    return status.connected && status.path === null;
  }

  private async run(): Promise<PollOutcome> {
    const { signal } = this.controller;

    while (this.attempts < this.maxAttempts) {
      if (signal.aborted) return "stopped";
      if (!this.stillWaiting()) return "abandoned";

      this.attempts++;
      const found = await this.resolver.findMount(this.kind);

      // Status may have moved on while the scan ran
      if (signal.aborted) return "stopped";
      if (!this.stillWaiting()) return "abandoned";

      if (found) {
        log.info(`Found ${this.kind.name} mount on attempt ${this.attempts}: ${found.path} (mode: ${found.mode})`);
        this.apply({ connected: true, path: found.path, usbDetected: true, mode: found.mode });
        return "found";
      }

      if (this.attempts >= this.maxAttempts) break;

      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (err) {
        if (isAbortError(err)) return "stopped";
        throw err;
      }
    }

    log.warn(`Mount path polling timed out for ${this.kind.name} after ${this.maxAttempts} attempts`);
    return "timeout";
  }
}
