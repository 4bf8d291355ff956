/**
 * USB Event Source Interface
 * Capability wrapper around a platform hot-plug backend. The monitor depends
 * on this abstraction only, so a host without USB access gets a no-op source.
 */

import type { RawUsbDescriptor } from "./normalize";

export interface UsbDeviceInfo {
  /** Backend-specific identity, e.g. "1-4" (bus-address) */
  id: string;
  /** Raw vendor/product fields, see readUsbIds() */
  descriptor: RawUsbDescriptor;
  /**
   * USB class of the device's interfaces: "media" for audio/MIDI,
   * "storage" for mass storage, other classes as "class-<n>"
   */
  usbClass?: string;
}

export type UsbEventHandler = (device: UsbDeviceInfo) => void | Promise<void>;

export interface UsbEventSource {
  /** False for the no-op source */
  readonly available: boolean;

  /**
   * Devices currently attached
   */
  enumerate(): Promise<UsbDeviceInfo[]>;

  /**
   * Subscribe to hot-plug notifications
   */
  startMonitoring(onConnect: UsbEventHandler, onDisconnect: UsbEventHandler): void;

  stopMonitoring(): void;
}

export const USB_CLASS_MEDIA = "media";
export const USB_CLASS_STORAGE = "storage";
