/**
 * libusb Source Tests
 * Class detection from fake descriptors, no hardware
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { MockUsbSource } from "../../src/discovery";
import { describeDevice, type DescribableDevice } from "../../src/discovery/node-usb";
import { createTestMonitor } from "../helpers";

function fakeDevice(bDeviceClass: number, interfaceClasses: number[] = []): DescribableDevice {
  return {
    busNumber: 1,
    deviceAddress: 9,
    deviceDescriptor: { bDeviceClass, idVendor: 0x2367, idProduct: 0x000c },
    configDescriptor: {
      interfaces: interfaceClasses.map((bInterfaceClass) => [{ bInterfaceClass }]),
    },
  };
}

describe("describeDevice", () => {
  it("reads ids and the bus address", () => {
    assert.deepStrictEqual(describeDevice(fakeDevice(0, [8])), {
      id: "1-9",
      descriptor: { idVendor: 9063, idProduct: 12 },
      usbClass: "storage",
    });
  });

  it("prefers audio among per-interface classes", () => {
    assert.strictEqual(describeDevice(fakeDevice(0, [8, 1])).usbClass, "media");
  });

  it("looks at the interfaces of a composite device", () => {
    assert.strictEqual(describeDevice(fakeDevice(0xef, [1, 1])).usbClass, "media");
    assert.strictEqual(describeDevice(fakeDevice(0xef, [8])).usbClass, "storage");
  });

  it("keeps the composite class when no interface is readable", () => {
    const device: DescribableDevice = {
      busNumber: 2,
      deviceAddress: 3,
      deviceDescriptor: { bDeviceClass: 0xef, idVendor: 1, idProduct: 2 },
    };
    assert.strictEqual(describeDevice(device).usbClass, "class-239");
  });

  it("uses a device-level class as is", () => {
    assert.strictEqual(describeDevice(fakeDevice(8)).usbClass, "storage");
    assert.strictEqual(describeDevice(fakeDevice(2, [1])).usbClass, "class-2");
  });

  it("has no class for a per-interface device without interfaces", () => {
    assert.strictEqual(describeDevice(fakeDevice(0)).usbClass, undefined);
  });

  it("an OP-Z in MIDI mode behind a composite descriptor is reported as other", async () => {
    const source = new MockUsbSource();
    const monitor = createTestMonitor({ usbSource: source });
    await monitor.start();

    await source.connect(describeDevice(fakeDevice(0xef, [1, 1])));

    assert.deepStrictEqual(monitor.getStatus().opz, {
      connected: true,
      path: null,
      usbDetected: true,
      mode: "other",
    });
    monitor.stop();
  });
});
