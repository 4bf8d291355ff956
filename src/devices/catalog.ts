/**
 * Device Catalog
 * Static descriptors for the supported Teenage Engineering samplers
 */

import {
  CONFIG_OP1_DETECTED_PATH,
  CONFIG_OP1_MOUNT_PATH,
  CONFIG_OPZ_DETECTED_PATH,
  CONFIG_OPZ_MOUNT_PATH,
} from "../store/keys";

export type DeviceId = "opz" | "op1";

/**
 * How a USB product id maps onto an operating mode
 * - storage: mass storage, disk should appear
 * - other: MIDI/audio mode, no disk access
 * - class_dependent: same id in normal and disk mode, decided by USB class
 */
export type UsbSubMode = "storage" | "other" | "class_dependent";

export interface DeviceConfigKeys {
  /** Manually configured mount path (developer mode) */
  mountPath: string;
  /** Last auto-detected mount path */
  detectedPath: string;
}

export interface DeviceKind {
  readonly id: DeviceId;
  readonly name: string;
  readonly displayNameLong: string;
  readonly storageKb: number;
  readonly vendorId: number;
  readonly productIds: readonly number[];
  readonly productModes: Readonly<Record<number, UsbSubMode>>;
  readonly requiredDirectories: readonly string[];
  /** Category folders inside the first required directory; at least one must exist */
  readonly sampleCategories: readonly string[];
  /** Files/folders present only when the device is in firmware upgrade mode */
  readonly upgradeModeMarkers: readonly string[];
  readonly configKeys: DeviceConfigKeys;
}

// Teenage Engineering, 0x2367
export const TE_VENDOR_ID = 9063;

export const OPZ_SAMPLE_CATEGORIES = [
  "1-kick",
  "2-snare",
  "3-perc",
  "4-fx",
  "5-bass",
  "6-lead",
  "7-arpeggio",
  "8-chord",
] as const;

export const OP_Z: DeviceKind = Object.freeze({
  id: "opz",
  name: "OP-Z",
  displayNameLong: "Teenage Engineering OP-Z",
  storageKb: 24000,
  vendorId: TE_VENDOR_ID,
  productIds: Object.freeze([12]),
  productModes: Object.freeze({ 12: "class_dependent" }),
  requiredDirectories: Object.freeze(["samplepacks"]),
  sampleCategories: OPZ_SAMPLE_CATEGORIES,
  upgradeModeMarkers: Object.freeze(["how_to_upgrade.txt", "systeminfo"]),
  configKeys: Object.freeze({
    mountPath: CONFIG_OPZ_MOUNT_PATH,
    detectedPath: CONFIG_OPZ_DETECTED_PATH,
  }),
} satisfies DeviceKind);

export const OP_1: DeviceKind = Object.freeze({
  id: "op1",
  name: "OP-1",
  displayNameLong: "Teenage Engineering OP-1",
  storageKb: 512000,
  vendorId: TE_VENDOR_ID,
  productIds: Object.freeze([2, 4]),
  productModes: Object.freeze({ 2: "storage", 4: "other" }),
  requiredDirectories: Object.freeze(["drum", "synth"]),
  sampleCategories: Object.freeze([]),
  upgradeModeMarkers: Object.freeze([]),
  configKeys: Object.freeze({
    mountPath: CONFIG_OP1_MOUNT_PATH,
    detectedPath: CONFIG_OP1_DETECTED_PATH,
  }),
} satisfies DeviceKind);

const DEVICE_KINDS: readonly DeviceKind[] = Object.freeze([OP_Z, OP_1]);

export function listDeviceKinds(): readonly DeviceKind[] {
  return DEVICE_KINDS;
}

export function isDeviceId(value: unknown): value is DeviceId {
  return value === "opz" || value === "op1";
}

export function getDeviceKind(id: DeviceId): DeviceKind {
  return id === "opz" ? OP_Z : OP_1;
}

export interface UsbMatch {
  kind: DeviceKind;
  subMode: UsbSubMode;
}

/**
 * Classify normalized USB identifiers against the catalog
 * @returns null for foreign vendors or unknown product ids
 */
export function findByUsbIds(vendorId: number | null, productId: number | null): UsbMatch | null {
  if (vendorId === null || productId === null) return null;

  for (const kind of DEVICE_KINDS) {
    if (kind.vendorId !== vendorId) continue;
    const subMode = kind.productModes[productId];
    if (subMode) {
      return { kind, subMode };
    }
  }
  return null;
}
