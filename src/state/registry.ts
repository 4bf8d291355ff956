/**
 * Status Registry
 * Single owner of the per-device status. Every method is synchronous, so a
 * call runs to completion before any other handler on the event loop sees
 * the map: no lock is ever held across I/O.
 */

import { listDeviceKinds, type DeviceId } from "../devices/catalog";
import { DISCONNECTED, type DeviceStatus, type DeviceStatusMap } from "./types";

function sameStatus(a: DeviceStatus, b: DeviceStatus): boolean {
  return (
    a.connected === b.connected &&
    a.path === b.path &&
    a.usbDetected === b.usbDetected &&
    a.mode === b.mode
  );
}

function assertConsistent(device: DeviceId, status: DeviceStatus): void {
  const mounted = status.mode === "storage" || status.mode === "upgrade";
  if (mounted !== Boolean(status.path)) {
    throw new RangeError(
      `Inconsistent status for ${device}: mode=${status.mode} path=${status.path}`
    );
  }
}

export class StatusRegistry {
  private statuses = new Map<DeviceId, DeviceStatus>();

  constructor() {
    for (const kind of listDeviceKinds()) {
      this.statuses.set(kind.id, { ...DISCONNECTED });
    }
  }

  /**
   * Replace the device's status if it differs from the stored one
   * @returns true if the stored value changed
   * @throws RangeError if path and mode disagree
   */
  update(device: DeviceId, next: DeviceStatus): boolean {
    assertConsistent(device, next);

    const current = this.read(device);
    if (sameStatus(current, next)) {
      return false;
    }

    this.statuses.set(device, {
      connected: next.connected,
      path: next.path,
      usbDetected: next.usbDetected,
      mode: next.mode,
    });
    return true;
  }

  read(device: DeviceId): DeviceStatus {
    const status = this.statuses.get(device) ?? DISCONNECTED;
    return { ...status };
  }

  readAll(): DeviceStatusMap {
    return {
      opz: this.read("opz"),
      op1: this.read("op1"),
    };
  }
}
