/**
 * Fallback source for hosts where the USB backend cannot load.
 * Monitoring degrades to scan-on-demand.
 */

import type { UsbDeviceInfo, UsbEventSource } from "./interface";

export class NoopUsbSource implements UsbEventSource {
  readonly available = false;

  constructor(readonly reason?: string) {}

  async enumerate(): Promise<UsbDeviceInfo[]> {
    return [];
  }

  startMonitoring(): void {}

  stopMonitoring(): void {}
}
