/**
 * Device Monitor
 * Turns USB hot-plug notifications and mount lookups into per-device status,
 * and pushes every real change to live subscribers.
 *
 * Per device:
 *   disconnected --connect(other)-----------------> other
 *   disconnected --connect(storage), mount found--> storage | upgrade
 *   disconnected --connect(storage), no mount-----> standby (OP-Z) or searching, + PollTask
 *   PollTask finds mount --------------------------> storage | upgrade
 *   any --disconnect-------------------------------> disconnected
 */

import { setTimeout as sleep } from "timers/promises";
import {
  findByUsbIds,
  getDeviceKind,
  listDeviceKinds,
  TE_VENDOR_ID,
  type DeviceId,
  type DeviceKind,
  type UsbSubMode,
} from "../devices/catalog";
import { readUsbIds, USB_CLASS_MEDIA, type UsbDeviceInfo, type UsbEventSource } from "../discovery";
import type { EventBroadcaster, Subscriber } from "../events/broadcaster";
import type { StatusRegistry } from "../state/registry";
import {
  DISCONNECTED,
  type DeviceStatus,
  type DeviceStatusBody,
  type DeviceStatusEvent,
  type DeviceStatusMap,
} from "../state/types";
import { getBoolean, type ConfigStore } from "../store/config-store";
import { CONFIG_DEVELOPER_MODE } from "../store/keys";
import { createLogger } from "../logger";
import { PollTask, type MountLocator } from "./poll-task";

export const DEVICE_STATUS_EVENT: DeviceStatusEvent["type"] = "device_status";

export interface DeviceMonitorOptions {
  registry: StatusRegistry;
  broadcaster: EventBroadcaster;
  resolver: MountLocator;
  usbSource: UsbEventSource;
  configStore: ConfigStore;
  pollAttempts?: number;
  pollIntervalMs?: number;
  /** Wait before the first mount lookup after a storage-mode connect */
  settleDelayMs?: number;
  /** Listen for hot-plug events (default: true) */
  monitorUsb?: boolean;
}

/**
 * Mode implied by the USB descriptor alone. pending_storage is internal:
 * it always resolves to storage/upgrade or standby before anything is
 * published.
 */
type UsbMode = "storage" | "pending_storage" | "other";

function classify(subMode: UsbSubMode, usbClass: string | undefined): UsbMode {
  if (subMode === "class_dependent") {
    return usbClass === USB_CLASS_MEDIA ? "other" : "pending_storage";
  }
  return subMode;
}

const log = createLogger("DeviceMonitor");

export class DeviceMonitor {
  private registry: StatusRegistry;
  private broadcaster: EventBroadcaster;
  private resolver: MountLocator;
  private usbSource: UsbEventSource;
  private configStore: ConfigStore;
  private pollAttempts: number;
  private pollIntervalMs: number;
  private settleDelayMs: number;
  private monitorUsb: boolean;
  private polls = new Map<DeviceId, PollTask>();
  // Bumped on every connect/disconnect; stale async handlers compare and bail
  private generations = new Map<DeviceId, number>();
  private shutdown = new AbortController();
  private started: Promise<void> | null = null;
  private monitoring = false;

  constructor(options: DeviceMonitorOptions) {
    this.registry = options.registry;
    this.broadcaster = options.broadcaster;
    this.resolver = options.resolver;
    this.usbSource = options.usbSource;
    this.configStore = options.configStore;
    this.pollAttempts = options.pollAttempts ?? 30;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.settleDelayMs = options.settleDelayMs ?? 1500;
    this.monitorUsb = options.monitorUsb ?? true;
  }

  /**
   * Initial scan, then hot-plug monitoring. Safe to call repeatedly.
   */
  start(): Promise<void> {
    if (!this.started) {
      this.started = this.initialize();
    }
    return this.started;
  }

  private async initialize(): Promise<void> {
    log.info("Initializing device monitor...");
    await this.scan();

    if (!this.monitorUsb || !this.usbSource.available) {
      log.info("USB hot-plug monitoring disabled, use refresh to rescan");
      return;
    }

    try {
      this.usbSource.startMonitoring(
        (device) => this.handleConnect(device),
        (device) => this.handleDisconnect(device)
      );
      this.monitoring = true;
      log.info("USB monitoring started");
    } catch (err) {
      log.error("Error starting USB monitoring:", err);
    }
  }

  stop(): void {
    this.shutdown.abort();
    if (this.monitoring) {
      try {
        this.usbSource.stopMonitoring();
        log.info("USB monitoring stopped");
      } catch (err) {
        log.error("Error stopping USB monitoring:", err);
      }
      this.monitoring = false;
    }
    for (const task of this.polls.values()) {
      task.stop();
    }
    this.polls.clear();
  }

  /**
   * True while hot-plug events are being received
   */
  get usbMonitoring(): boolean {
    return this.monitoring;
  }

  get subscriberCount(): number {
    return this.broadcaster.subscriberCount;
  }

  getStatus(): DeviceStatusMap {
    return this.registry.readAll();
  }

  /**
   * Active mount poll for a device, if any
   */
  pollTask(device: DeviceId): PollTask | undefined {
    return this.polls.get(device);
  }

  /**
   * Store a status and, if it changed, broadcast it and mirror the path
   * into the settings
   * @returns true if the status changed
   */
  applyStatus(device: DeviceId, status: DeviceStatus): boolean {
    if (!this.registry.update(device, status)) {
      return false;
    }

    const kind = getDeviceKind(device);
    log.info(
      `Broadcasting: ${kind.name} connected=${status.connected}, path=${status.path}, mode=${status.mode}`
    );
    this.broadcaster.publish(DEVICE_STATUS_EVENT, this.eventPayload(device, status));
    this.mirrorDetectedPath(kind, status);
    return true;
  }

  /**
   * Open a stream. The subscriber's queue starts with one status event per
   * device, taken in the same turn as the registration so no incremental
   * event can precede it.
   */
  subscribe(): Subscriber {
    const snapshot = this.registry.readAll();
    const initial = listDeviceKinds().map((kind) =>
      JSON.stringify({ type: DEVICE_STATUS_EVENT, ...this.eventPayload(kind.id, snapshot[kind.id]) })
    );
    return this.broadcaster.subscribe(initial);
  }

  unsubscribe(subscriber: Subscriber): void {
    this.broadcaster.unsubscribe(subscriber);
  }

  /**
   * Status map in the HTTP wire shape
   */
  statusBody(statuses: DeviceStatusMap = this.registry.readAll()): Record<DeviceId, DeviceStatusBody> {
    return {
      opz: toBody("opz", statuses.opz),
      op1: toBody("op1", statuses.op1),
    };
  }

  /**
   * Look for mounted devices, then for attached devices without a mount
   */
  async scan(): Promise<DeviceStatusMap> {
    log.info("Scanning for connected devices...");

    for (const kind of listDeviceKinds()) {
      const generation = this.generation(kind.id);
      const found = await this.resolver.findMount(kind);
      log.debug(`  ${kind.id}: mount_path=${found?.path ?? null}, mode=${found?.mode ?? null}`);

      // A hot-plug event during the lookup wins over what the lookup saw
      if (this.isStale(kind.id, generation)) continue;

      if (found) {
        this.applyStatus(kind.id, { connected: true, path: found.path, usbDetected: true, mode: found.mode });
      } else if (this.registry.read(kind.id).path !== null && !this.polls.get(kind.id)?.running) {
        // Volume we had is gone
        this.bump(kind.id);
        this.applyStatus(kind.id, { ...DISCONNECTED });
      }
    }

    const generations = new Map(listDeviceKinds().map((kind) => [kind.id, this.generation(kind.id)]));
    let devices: UsbDeviceInfo[] = [];
    try {
      devices = await this.usbSource.enumerate();
    } catch (err) {
      log.error("Error scanning for USB devices:", err);
    }

    for (const device of devices) {
      const { vendorId, productId } = readUsbIds(device.descriptor);
      const match = findByUsbIds(vendorId, productId);
      if (!match) continue;

      const { kind, subMode } = match;
      if (this.isStale(kind.id, generations.get(kind.id) ?? 0)) continue;
      if (this.registry.read(kind.id).connected) continue;

      const mode = classify(subMode, device.usbClass);
      if (mode === "other") {
        log.info(`Found ${kind.name} in normal mode on startup`);
        this.applyStatus(kind.id, { connected: true, path: null, usbDetected: true, mode: "other" });
      } else if (mode === "pending_storage") {
        log.info(`Found ${kind.name} in standby mode on startup (connected but off)`);
        this.applyStatus(kind.id, { connected: true, path: null, usbDetected: true, mode: "standby" });
      } else {
        log.info(`Found ${kind.name} in storage mode on startup, waiting for mount`);
        this.bump(kind.id);
        this.applyStatus(kind.id, { connected: true, path: null, usbDetected: true, mode: null });
        this.startPolling(kind);
      }
    }

    return this.registry.readAll();
  }

  /**
   * Hot-plug connect callback. Never throws.
   */
  async handleConnect(device: UsbDeviceInfo): Promise<void> {
    try {
      const { vendorId, productId } = readUsbIds(device.descriptor);
      log.debug(
        `USB connect ${device.id}: vendor=${vendorId}, product=${productId}, class=${device.usbClass ?? "unknown"}`
      );

      const match = findByUsbIds(vendorId, productId);
      if (!match) {
        if (vendorId === TE_VENDOR_ID) {
          log.info(`Unknown Teenage Engineering product ID: ${productId}`);
        }
        return;
      }

      const { kind, subMode } = match;
      const generation = this.bump(kind.id);
      const mode = classify(subMode, device.usbClass);
      log.info(`Detected ${kind.name} in ${mode} mode`);

      if (mode === "other") {
        this.stopPolling(kind.id);
        this.applyStatus(kind.id, { connected: true, path: null, usbDetected: true, mode: "other" });
        return;
      }

      if (this.settleDelayMs > 0) {
        try {
          await sleep(this.settleDelayMs, undefined, { signal: this.shutdown.signal });
        } catch (err) {
          if (this.shutdown.signal.aborted) return;
          throw err;
        }
      }
      if (this.isStale(kind.id, generation)) return;

      const found = await this.resolver.findMount(kind);
      if (this.isStale(kind.id, generation)) return;

      if (found) {
        log.info(`Found mount path: ${found.path} (mode: ${found.mode})`);
        this.applyStatus(kind.id, { connected: true, path: found.path, usbDetected: true, mode: found.mode });
        return;
      }

      if (mode === "pending_storage") {
        log.info(`No mount path for ${kind.name}, device appears to be in standby mode`);
        this.applyStatus(kind.id, { connected: true, path: null, usbDetected: true, mode: "standby" });
      } else {
        log.info(`Mount path not found for ${kind.name}, starting background polling...`);
        this.applyStatus(kind.id, { connected: true, path: null, usbDetected: true, mode: null });
      }
      this.startPolling(kind);
    } catch (err) {
      log.error(`Error handling USB connect for ${device.id}:`, err);
    }
  }

  /**
   * Hot-plug disconnect callback. Never throws.
   */
  async handleDisconnect(device: UsbDeviceInfo): Promise<void> {
    try {
      const { vendorId, productId } = readUsbIds(device.descriptor);
      log.debug(`USB disconnect ${device.id}: vendor=${vendorId}, product=${productId}`);

      const match = findByUsbIds(vendorId, productId);
      if (!match) return;

      const { kind } = match;
      this.bump(kind.id);
      this.stopPolling(kind.id);
      log.info(`Disconnected ${kind.name}`);
      this.applyStatus(kind.id, { ...DISCONNECTED });
    } catch (err) {
      log.error(`Error handling USB disconnect for ${device.id}:`, err);
    }
  }

  private startPolling(kind: DeviceKind): void {
    if (this.shutdown.signal.aborted) return;

    const existing = this.polls.get(kind.id);
    if (existing?.running) {
      log.debug(`Already polling for ${kind.name}`);
      return;
    }

    const task = new PollTask({
      kind,
      registry: this.registry,
      resolver: this.resolver,
      apply: (status) => {
        this.applyStatus(kind.id, status);
      },
      maxAttempts: this.pollAttempts,
      intervalMs: this.pollIntervalMs,
    });
    this.polls.set(kind.id, task);

    task
      .start()
      .then((outcome) => {
        log.debug(`Polling for ${kind.name} ended: ${outcome} after ${task.attempts} attempts`);
      })
      .catch((err) => {
        log.error(`Polling for ${kind.name} failed:`, err);
      })
      .finally(() => {
        if (this.polls.get(kind.id) === task) {
          this.polls.delete(kind.id);
        }
      });
  }

  private stopPolling(device: DeviceId): void {
    const task = this.polls.get(device);
    if (task) {
      task.stop();
      this.polls.delete(device);
    }
  }

  private generation(device: DeviceId): number {
    return this.generations.get(device) ?? 0;
  }

  private bump(device: DeviceId): number {
    const next = this.generation(device) + 1;
    this.generations.set(device, next);
    return next;
  }

  /**
   * True once a newer connect/disconnect arrived, or the monitor stopped
   */
  private isStale(device: DeviceId, generation: number): boolean {
    return this.shutdown.signal.aborted || this.generation(device) !== generation;
  }

  private eventPayload(device: DeviceId, status: DeviceStatus): Omit<DeviceStatusEvent, "type"> {
    return {
      device,
      device_name: getDeviceKind(device).name,
      connected: status.connected,
      path: status.path,
      usb_detected: status.usbDetected,
      mode: status.mode,
    };
  }

  /**
   * Keep the detected-path setting in sync, unless the user set the path
   * by hand (developer mode)
   */
  private mirrorDetectedPath(kind: DeviceKind, status: DeviceStatus): void {
    try {
      if (getBoolean(this.configStore, CONFIG_DEVELOPER_MODE, false)) return;

      if (status.connected && status.path && status.mode === "storage") {
        this.configStore.set(kind.configKeys.detectedPath, status.path);
      } else if (!status.connected) {
        this.configStore.set(kind.configKeys.detectedPath, "");
      }
    } catch (err) {
      log.error(`Failed to save detected path for ${kind.name}:`, err);
    }
  }
}

function toBody(device: DeviceId, status: DeviceStatus): DeviceStatusBody {
  return {
    connected: status.connected,
    path: status.path,
    usb_detected: status.usbDetected,
    mode: status.mode,
    device_name: getDeviceKind(device).name,
  };
}
