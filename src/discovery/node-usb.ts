/**
 * libusb-backed source (package "usb")
 */

import type * as UsbModule from "usb";
import type { UsbDeviceInfo, UsbEventHandler, UsbEventSource } from "./interface";
import { USB_CLASS_MEDIA, USB_CLASS_STORAGE } from "./interface";
import { createLogger } from "../logger";

export type UsbLibrary = typeof UsbModule;
type UsbDevice = ReturnType<UsbLibrary["getDeviceList"]>[number];

/**
 * The descriptor fields read from a libusb device
 */
export interface DescribableDevice {
  readonly busNumber: number;
  readonly deviceAddress: number;
  readonly deviceDescriptor: {
    readonly bDeviceClass: number;
    readonly idVendor: number;
    readonly idProduct: number;
  };
  readonly configDescriptor?: {
    readonly interfaces: ReadonlyArray<ReadonlyArray<{ readonly bInterfaceClass: number }>>;
  };
}

const log = createLogger("NodeUsbSource");

// USB-IF class codes
const CLASS_PER_INTERFACE = 0x00;
const CLASS_AUDIO = 0x01;
const CLASS_MASS_STORAGE = 0x08;
// Composite devices using interface association
const CLASS_MISCELLANEOUS = 0xef;

function className(code: number): string {
  if (code === CLASS_AUDIO) return USB_CLASS_MEDIA;
  if (code === CLASS_MASS_STORAGE) return USB_CLASS_STORAGE;
  return `class-${code}`;
}

/**
 * Interface classes of the active configuration. Reading it can fail
 * without permissions on the device node.
 */
function interfaceClasses(device: DescribableDevice): number[] {
  try {
    const interfaces = device.configDescriptor?.interfaces ?? [];
    return interfaces.flatMap((alts) => alts.map((alt) => alt.bInterfaceClass));
  } catch (err) {
    log.debug(`Config descriptor unavailable for ${device.busNumber}-${device.deviceAddress}:`, err);
    return [];
  }
}

function detectClass(device: DescribableDevice): string | undefined {
  const deviceClass = device.deviceDescriptor.bDeviceClass;
  if (deviceClass !== CLASS_PER_INTERFACE && deviceClass !== CLASS_MISCELLANEOUS) {
    return className(deviceClass);
  }

  // Class defined per interface: audio wins, then storage
  const classes = interfaceClasses(device);
  if (classes.includes(CLASS_AUDIO)) return USB_CLASS_MEDIA;
  if (classes.includes(CLASS_MASS_STORAGE)) return USB_CLASS_STORAGE;
  if (classes.length > 0) return className(classes[0]);
  return deviceClass === CLASS_PER_INTERFACE ? undefined : className(deviceClass);
}

export function describeDevice(device: DescribableDevice): UsbDeviceInfo {
  return {
    id: `${device.busNumber}-${device.deviceAddress}`,
    descriptor: {
      idVendor: device.deviceDescriptor.idVendor,
      idProduct: device.deviceDescriptor.idProduct,
    },
    usbClass: detectClass(device),
  };
}

export class NodeUsbSource implements UsbEventSource {
  readonly available = true;
  private attachListener: ((device: UsbDevice) => void) | null = null;
  private detachListener: ((device: UsbDevice) => void) | null = null;

  constructor(private lib: UsbLibrary) {}

  async enumerate(): Promise<UsbDeviceInfo[]> {
    return this.lib.getDeviceList().map(describeDevice);
  }

  startMonitoring(onConnect: UsbEventHandler, onDisconnect: UsbEventHandler): void {
    this.stopMonitoring();

    this.attachListener = (device) => {
      Promise.resolve(onConnect(describeDevice(device))).catch((err) => {
        log.error("Attach handler failed:", err);
      });
    };
    this.detachListener = (device) => {
      Promise.resolve(onDisconnect(describeDevice(device))).catch((err) => {
        log.error("Detach handler failed:", err);
      });
    };

    this.lib.usb.on("attach", this.attachListener);
    this.lib.usb.on("detach", this.detachListener);
  }

  stopMonitoring(): void {
    if (this.attachListener) {
      this.lib.usb.off("attach", this.attachListener);
      this.attachListener = null;
    }
    if (this.detachListener) {
      this.lib.usb.off("detach", this.detachListener);
      this.detachListener = null;
    }
  }
}
