/**
 * Device Routes - status, rescan, open in file browser
 */

import { spawn } from "child_process";
import { existsSync } from "fs";
import { getDeviceKind, isDeviceId } from "../../devices/catalog";
import type { DeviceMonitor } from "../../monitor/device-monitor";
import { getBoolean, getString, type ConfigStore } from "../../store/config-store";
import { CONFIG_DEVELOPER_MODE } from "../../store/keys";
import { errorMessage, jsonResponse, type JsonSink } from "../helpers";

export type OpenPathFn = (path: string) => Promise<void>;

export interface DeviceRouteDependencies {
  monitor: Pick<DeviceMonitor, "start" | "scan" | "getStatus" | "statusBody">;
  configStore: ConfigStore;
  /** Opens a folder in the host file browser (injectable for testing) */
  openPath?: OpenPathFn;
  pathExists?: (path: string) => boolean;
}

function fileBrowserCommand(platform: NodeJS.Platform): string {
  if (platform === "darwin") return "open";
  if (platform === "win32") return "explorer";
  return "xdg-open";
}

/**
 * Launch the platform file browser, detached
 */
export function defaultOpenPath(path: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(fileBrowserCommand(platform), [path], {
      detached: true,
      stdio: "ignore",
    });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}

/**
 * Create device route handlers
 */
export function createDeviceRoutes(deps: DeviceRouteDependencies) {
  const openPath = deps.openPath ?? defaultOpenPath;
  const pathExists = deps.pathExists ?? existsSync;

  return {
    /**
     * GET /device-status
     * Starts the monitor on first use
     */
    async getStatus(res: JsonSink): Promise<void> {
      await deps.monitor.start();
      jsonResponse(res, deps.monitor.statusBody());
    },

    /**
     * GET /refresh-device-scan
     */
    async refresh(res: JsonSink): Promise<void> {
      const statuses = await deps.monitor.scan();
      jsonResponse(res, deps.monitor.statusBody(statuses));
    },

    /**
     * GET /open-device-directory?device=opz|op1
     * Detected path first, then the configured one
     */
    async openDirectory(res: JsonSink, query: URLSearchParams): Promise<void> {
      const device = query.get("device") ?? "opz";
      if (!isDeviceId(device)) {
        jsonResponse(res, { error: "Device path not found" }, 404);
        return;
      }

      let path = deps.monitor.getStatus()[device].path;
      if (!path) {
        const keys = getDeviceKind(device).configKeys;
        const key = getBoolean(deps.configStore, CONFIG_DEVELOPER_MODE, false)
          ? keys.mountPath
          : keys.detectedPath;
        path = getString(deps.configStore, key);
      }

      if (!path || !pathExists(path)) {
        jsonResponse(res, { error: "Device path not found" }, 404);
        return;
      }

      try {
        await openPath(path);
        jsonResponse(res, { success: true });
      } catch (err) {
        jsonResponse(res, { error: errorMessage(err) }, 500);
      }
    },
  };
}
