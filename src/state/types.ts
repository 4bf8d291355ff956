/**
 * Device status types
 */

import type { DeviceId } from "../devices/catalog";

/**
 * - storage: disk mounted and valid
 * - upgrade: firmware upgrade volume mounted
 * - other: normal/MIDI mode, no disk access
 * - standby: connected but powered off (OP-Z)
 * null: nothing known, or still searching for the mount
 */
export type DeviceMode = "storage" | "upgrade" | "other" | "standby";

export interface DeviceStatus {
  connected: boolean;
  /** Only set in storage and upgrade modes */
  path: string | null;
  usbDetected: boolean;
  mode: DeviceMode | null;
}

export type DeviceStatusMap = Record<DeviceId, DeviceStatus>;

/**
 * Wire shape used by /device-status and the event stream
 */
export interface DeviceStatusBody {
  connected: boolean;
  path: string | null;
  usb_detected: boolean;
  mode: DeviceMode | null;
  device_name: string;
}

/**
 * One `device_status` message on the event stream
 */
export type DeviceStatusEvent = DeviceStatusBody & {
  type: "device_status";
  device: DeviceId;
};

export const DISCONNECTED: Readonly<DeviceStatus> = Object.freeze({
  connected: false,
  path: null,
  usbDetected: false,
  mode: null,
});
