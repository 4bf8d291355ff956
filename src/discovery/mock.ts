/**
 * Mock USB Source for Testing
 * Can replace the real backend and emit hot-plug events on demand
 */

import type { UsbDeviceInfo, UsbEventHandler, UsbEventSource } from "./interface";

export class MockUsbSource implements UsbEventSource {
  readonly available = true;
  private devices: UsbDeviceInfo[];
  private onConnect: UsbEventHandler | null = null;
  private onDisconnect: UsbEventHandler | null = null;
  public enumerateCalls = 0;

  constructor(devices: UsbDeviceInfo[] = []) {
    this.devices = [...devices];
  }

  async enumerate(): Promise<UsbDeviceInfo[]> {
    this.enumerateCalls++;
    return [...this.devices];
  }

  startMonitoring(onConnect: UsbEventHandler, onDisconnect: UsbEventHandler): void {
    this.onConnect = onConnect;
    this.onDisconnect = onDisconnect;
  }

  stopMonitoring(): void {
    this.onConnect = null;
    this.onDisconnect = null;
  }

  get monitoring(): boolean {
    return this.onConnect !== null;
  }

  /**
   * Simulate a device being plugged in; resolves when the handler settles
   */
  async connect(device: UsbDeviceInfo): Promise<void> {
    this.devices.push(device);
    await this.onConnect?.(device);
  }

  /**
   * Simulate a device being unplugged
   */
  async disconnect(device: UsbDeviceInfo): Promise<void> {
    this.devices = this.devices.filter((d) => d.id !== device.id);
    await this.onDisconnect?.(device);
  }

  // Helper to change attached devices without firing events
  setDevices(devices: UsbDeviceInfo[]): void {
    this.devices = [...devices];
  }
}
