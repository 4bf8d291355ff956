/**
 * Health Route - monitor status
 */

import { jsonResponse, type JsonSink } from "../helpers";
import type { DeviceMonitor } from "../../monitor/device-monitor";

export interface HealthDependencies {
  monitor: Pick<DeviceMonitor, "usbMonitoring" | "subscriberCount" | "getStatus">;
}

/**
 * Create health route handler
 */
export function createHealthRoute(deps: HealthDependencies) {
  return {
    /**
     * GET /api/health
     */
    get(res: JsonSink): void {
      const statuses = deps.monitor.getStatus();
      jsonResponse(res, {
        usbMonitoring: deps.monitor.usbMonitoring,
        subscribers: deps.monitor.subscriberCount,
        devices: {
          opz: statuses.opz.connected,
          op1: statuses.op1.connected,
        },
      });
    },
  };
}
