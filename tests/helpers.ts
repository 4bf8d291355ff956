/**
 * Shared test doubles
 */

import { EventEmitter } from "events";
import type { OutgoingHttpHeaders } from "http";
import type { DeviceKind } from "../src/devices/catalog";
import { MockUsbSource, type UsbDeviceInfo, type UsbEventSource } from "../src/discovery";
import { EventBroadcaster } from "../src/events/broadcaster";
import type { MountResult } from "../src/mount/resolver";
import { DeviceMonitor } from "../src/monitor/device-monitor";
import type { MountLocator } from "../src/monitor/poll-task";
import type { EventSocket, StreamResponse } from "../src/server/routes/events";
import type { JsonSink } from "../src/server/helpers";
import { StatusRegistry } from "../src/state/registry";
import { MemoryConfigStore, type ConfigStore } from "../src/store/config-store";

/**
 * Resolver that answers from a script: each call consumes the next entry
 * for that device, the last entry repeats
 */
export class ScriptedResolver implements MountLocator {
  public calls: Record<string, number> = {};
  private scripts = new Map<string, Array<MountResult | null>>();

  script(device: string, results: Array<MountResult | null>): this {
    this.scripts.set(device, results);
    return this;
  }

  async findMount(kind: DeviceKind): Promise<MountResult | null> {
    const n = this.calls[kind.id] ?? 0;
    this.calls[kind.id] = n + 1;
    const script = this.scripts.get(kind.id) ?? [];
    if (script.length === 0) return null;
    return script[Math.min(n, script.length - 1)];
  }
}

export function nulls(count: number): null[] {
  return Array.from({ length: count }, () => null);
}

export const OPZ_DISK: UsbDeviceInfo = {
  id: "1-4",
  descriptor: { ID_VENDOR_ID: "2367", ID_MODEL_ID: "000c" },
  usbClass: "storage",
};

export const OPZ_MIDI: UsbDeviceInfo = {
  id: "1-4",
  descriptor: { ID_VENDOR_ID: "2367", ID_MODEL_ID: "000c" },
  usbClass: "media",
};

export const OP1_DISK: UsbDeviceInfo = {
  id: "1-5",
  descriptor: { idVendor: 9063, idProduct: 2 },
  usbClass: "storage",
};

export const OP1_MIDI: UsbDeviceInfo = {
  id: "1-5",
  descriptor: { idVendor: 9063, idProduct: 4 },
  usbClass: "media",
};

export const FOREIGN: UsbDeviceInfo = {
  id: "2-1",
  descriptor: { idVendor: 0x16c0, idProduct: 0x048a },
};

/**
 * Let pending promise callbacks and I/O run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Monitor wired to in-process doubles, no settle delay
 */
export function createTestMonitor(
  options: { resolver?: ScriptedResolver; usbSource?: UsbEventSource; configStore?: ConfigStore } = {}
): DeviceMonitor {
  return new DeviceMonitor({
    registry: new StatusRegistry(),
    broadcaster: new EventBroadcaster(),
    resolver: options.resolver ?? new ScriptedResolver(),
    usbSource: options.usbSource ?? new MockUsbSource(),
    configStore: options.configStore ?? new MemoryConfigStore(),
    pollIntervalMs: 1,
    settleDelayMs: 0,
  });
}

/**
 * Captures a JSON response
 */
export class MockResponse implements JsonSink {
  status = 0;
  headers: OutgoingHttpHeaders = {};
  body = "";

  writeHead(status: number, headers: OutgoingHttpHeaders): void {
    this.status = status;
    this.headers = headers;
  }

  end(body: string): void {
    this.body = body;
  }

  json(): unknown {
    return JSON.parse(this.body);
  }
}

/**
 * Server side of an event stream: request and response in one emitter
 */
export class MockStream extends EventEmitter implements StreamResponse {
  destroyed = false;
  writableEnded = false;
  status = 0;
  headers: OutgoingHttpHeaders = {};
  chunks: string[] = [];
  /** Report a full socket buffer on write */
  full = false;

  writeHead(status: number, headers: OutgoingHttpHeaders): void {
    this.status = status;
    this.headers = headers;
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return !this.full;
  }

  end(): void {
    this.writableEnded = true;
  }
}

export class MockSocket extends EventEmitter implements EventSocket {
  readonly OPEN = 1;
  readyState = 1;
  sent: string[] = [];
  pings = 0;
  failSend = false;

  send(data: string): void {
    if (this.failSend) throw new Error("socket hang up");
    this.sent.push(data);
  }

  ping(): void {
    this.pings++;
  }
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
