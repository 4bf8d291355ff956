/**
 * Device Routes Unit Tests
 */

import { describe, it, mock, beforeEach, afterEach, type Mock } from "node:test";
import assert from "node:assert";
import { createDeviceRoutes } from "../../src/server/routes/devices";
import type { DeviceMonitor } from "../../src/monitor/device-monitor";
import { MemoryConfigStore } from "../../src/store/config-store";
import { MockResponse, ScriptedResolver, createTestMonitor } from "../helpers";

describe("Device Routes", () => {
  let resolver: ScriptedResolver;
  let monitor: DeviceMonitor;
  let configStore: MemoryConfigStore;
  let openPath: Mock<(path: string) => Promise<void>>;

  beforeEach(() => {
    resolver = new ScriptedResolver();
    configStore = new MemoryConfigStore();
    monitor = createTestMonitor({ resolver, configStore });
    openPath = mock.fn(async (_path: string) => {});
  });

  afterEach(() => {
    monitor.stop();
  });

  function routes(existing: string[] = []) {
    return createDeviceRoutes({
      monitor,
      configStore,
      openPath,
      pathExists: (path) => existing.includes(path),
    });
  }

  describe("getStatus", () => {
    it("starts the monitor and returns both devices", async () => {
      resolver.script("op1", [{ path: "/Volumes/OP-1", mode: "storage" }]);
      const res = new MockResponse();

      await routes().getStatus(res);

      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(res.headers, { "Content-Type": "application/json" });
      assert.deepStrictEqual(res.json(), {
        opz: { connected: false, path: null, usb_detected: false, mode: null, device_name: "OP-Z" },
        op1: { connected: true, path: "/Volumes/OP-1", usb_detected: true, mode: "storage", device_name: "OP-1" },
      });
    });

    it("only scans on the first request", async () => {
      const r = routes();
      await r.getStatus(new MockResponse());
      await r.getStatus(new MockResponse());
      assert.strictEqual(resolver.calls.opz, 1);
    });
  });

  describe("refresh", () => {
    it("rescans and returns the fresh statuses", async () => {
      const r = routes();
      await r.getStatus(new MockResponse());

      resolver.script("opz", [{ path: "/Volumes/OP-Z", mode: "upgrade" }]);
      const res = new MockResponse();
      await r.refresh(res);

      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(res.json(), {
        opz: { connected: true, path: "/Volumes/OP-Z", usb_detected: true, mode: "upgrade", device_name: "OP-Z" },
        op1: { connected: false, path: null, usb_detected: false, mode: null, device_name: "OP-1" },
      });
    });
  });

  describe("openDirectory", () => {
    it("opens the live mount path", async () => {
      monitor.applyStatus("op1", { connected: true, path: "/Volumes/OP-1", usbDetected: true, mode: "storage" });
      const res = new MockResponse();

      await routes(["/Volumes/OP-1"]).openDirectory(res, new URLSearchParams("device=op1"));

      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(res.json(), { success: true });
      assert.strictEqual(openPath.mock.callCount(), 1);
      assert.deepStrictEqual(openPath.mock.calls[0].arguments, ["/Volumes/OP-1"]);
    });

    it("defaults to the OP-Z", async () => {
      monitor.applyStatus("opz", { connected: true, path: "/Volumes/OP-Z", usbDetected: true, mode: "storage" });
      const res = new MockResponse();

      await routes(["/Volumes/OP-Z"]).openDirectory(res, new URLSearchParams());

      assert.deepStrictEqual(openPath.mock.calls[0].arguments, ["/Volumes/OP-Z"]);
    });

    it("falls back to the last detected path", async () => {
      configStore.set("OP1_DETECTED_PATH", "/Volumes/OP-1");
      configStore.set("OP1_MOUNT_PATH", "/manual/op1");
      const res = new MockResponse();

      await routes(["/Volumes/OP-1", "/manual/op1"]).openDirectory(res, new URLSearchParams("device=op1"));

      assert.deepStrictEqual(openPath.mock.calls[0].arguments, ["/Volumes/OP-1"]);
    });

    it("uses the manual path in developer mode", async () => {
      configStore.set("DEVELOPER_MODE", "true");
      configStore.set("OP1_DETECTED_PATH", "/Volumes/OP-1");
      configStore.set("OP1_MOUNT_PATH", "/manual/op1");
      const res = new MockResponse();

      await routes(["/Volumes/OP-1", "/manual/op1"]).openDirectory(res, new URLSearchParams("device=op1"));

      assert.deepStrictEqual(openPath.mock.calls[0].arguments, ["/manual/op1"]);
    });

    it("returns 404 when no path is known", async () => {
      const res = new MockResponse();
      await routes().openDirectory(res, new URLSearchParams("device=opz"));

      assert.strictEqual(res.status, 404);
      assert.deepStrictEqual(res.json(), { error: "Device path not found" });
      assert.strictEqual(openPath.mock.callCount(), 0);
    });

    it("returns 404 when the path no longer exists", async () => {
      configStore.set("OPZ_DETECTED_PATH", "/Volumes/OP-Z");
      const res = new MockResponse();

      await routes().openDirectory(res, new URLSearchParams("device=opz"));

      assert.strictEqual(res.status, 404);
      assert.strictEqual(openPath.mock.callCount(), 0);
    });

    it("returns 404 for an unknown device", async () => {
      const res = new MockResponse();
      await routes().openDirectory(res, new URLSearchParams("device=op2"));

      assert.strictEqual(res.status, 404);
      assert.deepStrictEqual(res.json(), { error: "Device path not found" });
    });

    it("returns 500 when the file browser fails to launch", async () => {
      monitor.applyStatus("opz", { connected: true, path: "/Volumes/OP-Z", usbDetected: true, mode: "storage" });
      openPath.mock.mockImplementation(async () => {
        throw new Error("spawn xdg-open ENOENT");
      });
      const res = new MockResponse();

      await routes(["/Volumes/OP-Z"]).openDirectory(res, new URLSearchParams("device=opz"));

      assert.strictEqual(res.status, 500);
      assert.deepStrictEqual(res.json(), { error: "spawn xdg-open ENOENT" });
    });
  });
});
