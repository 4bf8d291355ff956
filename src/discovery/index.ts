/**
 * USB Discovery Module
 * Re-exports all discovery components
 */

export * from "./interface";
export * from "./normalize";
export * from "./noop";
export * from "./mock";

import type { UsbEventSource } from "./interface";
import { NoopUsbSource } from "./noop";
import { createLogger } from "../logger";

const log = createLogger("Discovery");

/**
 * Create the hot-plug source for this host. The libusb binding is optional:
 * when it cannot be loaded, monitoring falls back to on-demand scans.
 */
export async function createUsbSource(options?: { enabled?: boolean }): Promise<UsbEventSource> {
  if (options?.enabled === false) {
    return new NoopUsbSource("disabled by configuration");
  }

  try {
    const [lib, { NodeUsbSource }] = await Promise.all([import("usb"), import("./node-usb")]);
    return new NodeUsbSource(lib);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn(`USB backend not available: ${reason}`);
    log.warn("USB hot-plug monitoring disabled; devices are found by scan only.");
    return new NoopUsbSource(reason);
  }
}
