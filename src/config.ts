/**
 * Configuration from environment variables
 * CLI arguments in index.ts override these
 */

import { homedir } from "os";
import { join } from "path";

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

const APP_DIR_NAME = "Sampler Monitor";
const CONFIG_FILE_NAME = "sampler_monitor_config.json";

/**
 * Per-OS directory for the persisted settings file
 */
export function defaultConfigDir(platform: NodeJS.Platform = process.platform): string {
  if (platform === "darwin") {
    return join(homedir(), "Library", "Application Support", APP_DIR_NAME);
  }
  if (platform === "win32") {
    return join(process.env.APPDATA ?? homedir(), APP_DIR_NAME);
  }
  return join(homedir(), ".config", APP_DIR_NAME);
}

export function defaultConfigPath(platform: NodeJS.Platform = process.platform): string {
  return join(defaultConfigDir(platform), CONFIG_FILE_NAME);
}

export const config = {
  /**
   * HTTP server port
   * @env SM_HTTP_PORT
   * @default 5000
   */
  HTTP_PORT: getEnvNumber("SM_HTTP_PORT", 5000),

  /**
   * Settings file (developer mode, manual and detected mount paths)
   * @env SM_CONFIG_PATH
   */
  CONFIG_PATH: getEnvString("SM_CONFIG_PATH", defaultConfigPath()),

  /**
   * Mount path polling attempts after a USB connect without a mount
   * @env SM_POLL_ATTEMPTS
   * @default 30
   */
  POLL_ATTEMPTS: getEnvNumber("SM_POLL_ATTEMPTS", 30),

  /**
   * Delay between polling attempts in milliseconds
   * @env SM_POLL_INTERVAL
   * @default 1000
   */
  POLL_INTERVAL: getEnvNumber("SM_POLL_INTERVAL", 1000),

  /**
   * Wait after a storage-mode connect before the first mount lookup, in ms.
   * The OS usually needs a moment to mount the volume.
   * @env SM_SETTLE_DELAY
   * @default 1500
   */
  SETTLE_DELAY: getEnvNumber("SM_SETTLE_DELAY", 1500),

  /**
   * Idle time before an event stream gets a keepalive, in ms
   * @env SM_KEEPALIVE_INTERVAL
   * @default 30000
   */
  KEEPALIVE_INTERVAL: getEnvNumber("SM_KEEPALIVE_INTERVAL", 30000),

  /**
   * Listen for USB hot-plug events (scan on demand only when false)
   * @env SM_USB_MONITORING
   * @default true
   */
  USB_MONITORING: getEnvBoolean("SM_USB_MONITORING", true),

  /**
   * Log level: debug, info, warn, error
   * @env SM_LOG_LEVEL
   * @default "info"
   */
  LOG_LEVEL: getEnvString("SM_LOG_LEVEL", "info"),
};

/**
 * Print current configuration (for debugging)
 */
export function printConfig(): void {
  console.log("Sampler Monitor Configuration:");
  console.log(`  HTTP Port:      ${config.HTTP_PORT}`);
  console.log(`  Config File:    ${config.CONFIG_PATH}`);
  console.log(`  Poll:           ${config.POLL_ATTEMPTS} x ${config.POLL_INTERVAL}ms`);
  console.log(`  Settle Delay:   ${config.SETTLE_DELAY}ms`);
  console.log(`  Keepalive:      ${config.KEEPALIVE_INTERVAL}ms`);
  console.log(`  USB Monitoring: ${config.USB_MONITORING}`);
  console.log(`  Log Level:      ${config.LOG_LEVEL}`);
}
