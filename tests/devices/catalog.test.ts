/**
 * Device Catalog Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import {
  OP_1,
  OP_Z,
  TE_VENDOR_ID,
  findByUsbIds,
  getDeviceKind,
  isDeviceId,
  listDeviceKinds,
} from "../../src/devices/catalog";

describe("Device Catalog", () => {
  it("lists OP-Z then OP-1", () => {
    assert.deepStrictEqual(
      listDeviceKinds().map((k) => k.id),
      ["opz", "op1"]
    );
  });

  it("uses the Teenage Engineering vendor id for both devices", () => {
    assert.strictEqual(TE_VENDOR_ID, 0x2367);
    assert.strictEqual(OP_Z.vendorId, TE_VENDOR_ID);
    assert.strictEqual(OP_1.vendorId, TE_VENDOR_ID);
  });

  it("descriptors are frozen", () => {
    assert.ok(Object.isFrozen(OP_Z));
    assert.ok(Object.isFrozen(OP_1.requiredDirectories));
  });

  it("only the OP-Z has upgrade markers and sample categories", () => {
    assert.deepStrictEqual([...OP_Z.upgradeModeMarkers], ["how_to_upgrade.txt", "systeminfo"]);
    assert.strictEqual(OP_Z.sampleCategories.length, 8);
    assert.strictEqual(OP_1.upgradeModeMarkers.length, 0);
    assert.strictEqual(OP_1.sampleCategories.length, 0);
  });

  describe("isDeviceId / getDeviceKind", () => {
    it("accepts known ids only", () => {
      assert.strictEqual(isDeviceId("opz"), true);
      assert.strictEqual(isDeviceId("op1"), true);
      assert.strictEqual(isDeviceId("op-z"), false);
      assert.strictEqual(isDeviceId(undefined), false);
    });

    it("returns the descriptor", () => {
      assert.strictEqual(getDeviceKind("op1").name, "OP-1");
      assert.strictEqual(getDeviceKind("opz").configKeys.detectedPath, "OPZ_DETECTED_PATH");
    });
  });

  describe("findByUsbIds", () => {
    it("classifies OP-Z product 12 as class dependent", () => {
      const match = findByUsbIds(9063, 12);
      assert.strictEqual(match?.kind.id, "opz");
      assert.strictEqual(match?.subMode, "class_dependent");
    });

    it("classifies OP-1 storage and MIDI products", () => {
      assert.strictEqual(findByUsbIds(9063, 2)?.subMode, "storage");
      assert.strictEqual(findByUsbIds(9063, 4)?.subMode, "other");
      assert.strictEqual(findByUsbIds(9063, 4)?.kind.id, "op1");
    });

    it("ignores other vendors and unknown products", () => {
      assert.strictEqual(findByUsbIds(0x16c0, 12), null);
      assert.strictEqual(findByUsbIds(9063, 99), null);
      assert.strictEqual(findByUsbIds(null, 12), null);
      assert.strictEqual(findByUsbIds(9063, null), null);
    });
  });
});
