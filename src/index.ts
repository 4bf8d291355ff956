/**
 * Sampler Monitor - Entry Point
 * USB presence monitor and live status stream for OP-Z / OP-1
 */

import { parseArgs } from "util";
import { config, printConfig } from "./config";
import { findByUsbIds } from "./devices/catalog";
import { createUsbSource, readUsbIds } from "./discovery";
import { EventBroadcaster } from "./events/broadcaster";
import { createLogger } from "./logger";
import { MountResolver } from "./mount/resolver";
import { DeviceMonitor } from "./monitor/device-monitor";
import { MonitorServer } from "./server/http";
import { StatusRegistry } from "./state/registry";
import { JsonConfigStore } from "./store/config-store";

// Parse CLI arguments (override ENV defaults)
const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    http: { type: "string", short: "p", default: String(config.HTTP_PORT) },
    config: { type: "string", short: "c", default: config.CONFIG_PATH },
    list: { type: "boolean", short: "l", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
});

// Help
if (values.help) {
  console.log(`
Sampler Monitor

Usage:
  npx tsx src/index.ts [options]

Options:
  -p, --http <port>      HTTP server port (default: ${config.HTTP_PORT})
  -c, --config <file>    Settings file (default: ${config.CONFIG_PATH})
  -l, --list             List attached USB devices
  -h, --help             Show this help

Environment Variables (overridden by CLI args):
  SM_HTTP_PORT           HTTP server port (default: 5000)
  SM_CONFIG_PATH         Settings file
  SM_POLL_ATTEMPTS       Mount polling attempts (default: 30)
  SM_POLL_INTERVAL       Mount polling interval in ms (default: 1000)
  SM_SETTLE_DELAY        Wait before first mount lookup in ms (default: 1500)
  SM_KEEPALIVE_INTERVAL  Event stream keepalive in ms (default: 30000)
  SM_USB_MONITORING      Listen for hot-plug events (default: true)
  SM_LOG_LEVEL           Log level: debug, info, warn, error (default: info)
`);
  process.exit(0);
}

const log = createLogger("Main");
if (config.LOG_LEVEL === "debug") {
  printConfig();
}
const usbSource = await createUsbSource({ enabled: config.USB_MONITORING });

// List USB devices
if (values.list) {
  if (!usbSource.available) {
    console.log("USB backend not available on this host.");
    process.exit(1);
  }
  console.log("Attached USB devices:");
  for (const device of await usbSource.enumerate()) {
    const { vendorId, productId } = readUsbIds(device.descriptor);
    const match = findByUsbIds(vendorId, productId);
    const hex = (id: number | null) => (id === null ? "????" : id.toString(16).padStart(4, "0"));
    console.log(`  ${device.id}  ${hex(vendorId)}:${hex(productId)}${match ? ` [${match.kind.name}]` : ""}`);
    if (device.usbClass) console.log(`    Class: ${device.usbClass}`);
  }
  process.exit(0);
}

const configStore = new JsonConfigStore(values.config ?? config.CONFIG_PATH);
const registry = new StatusRegistry();
const broadcaster = new EventBroadcaster();
const resolver = new MountResolver();

if (!resolver.supported) {
  log.warn(`No mount scan for platform ${process.platform}; set the device path manually in developer mode`);
}

const monitor = new DeviceMonitor({
  registry,
  broadcaster,
  resolver,
  usbSource,
  configStore,
  pollAttempts: config.POLL_ATTEMPTS,
  pollIntervalMs: config.POLL_INTERVAL,
  settleDelayMs: config.SETTLE_DELAY,
  monitorUsb: config.USB_MONITORING,
});

const port = parseInt(values.http || String(config.HTTP_PORT), 10);
const server = new MonitorServer({
  port,
  monitor,
  configStore,
  keepaliveMs: config.KEEPALIVE_INTERVAL,
});

await server.start();
await monitor.start();

console.log(`
Sampler Monitor started!

  HTTP:      http://localhost:${port}
  WebSocket: ws://localhost:${port}/device-events/ws
  Settings:  ${configStore.path}

API:
  GET  /device-status           - Status of every device
  GET  /device-events           - Live status (text/event-stream)
  GET  /open-device-directory   - Open device folder (?device=opz|op1)
  GET  /refresh-device-scan     - Rescan now
  GET  /api/health              - Monitor status

Press Ctrl+C to stop.
`);

// Graceful shutdown
async function shutdown() {
  console.log("\nShutting down...");
  monitor.stop();
  broadcaster.closeAll();
  try {
    await server.stop();
  } catch (err) {
    log.error("Error stopping server:", err);
  }
  process.exit(0);
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
