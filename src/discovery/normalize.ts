/**
 * USB identifier normalization
 *
 * Vendor/product ids reach us as numbers, "0x"-prefixed hex, bare 4-digit hex
 * (Windows reports "2367" for 0x2367) or decimal strings, depending on the
 * host and the event source. Everything is reduced to one integer before it
 * is compared against the catalog.
 */

const HEX = /^[0-9a-f]+$/;
const DECIMAL = /^[+-]?[0-9]+$/;

function parseHex(value: string): number | null {
  return HEX.test(value) ? parseInt(value, 16) : null;
}

function parseDecimal(value: string): number | null {
  return DECIMAL.test(value) ? parseInt(value, 10) : null;
}

/**
 * Convert a USB id in any supported encoding to an integer
 * @returns null when the value cannot be read as an id
 */
export function normalizeUsbId(value: unknown): number | null {
  if (value === null || value === undefined) return null;

  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }

  if (typeof value !== "string") return null;

  const text = value.trim().toLowerCase();
  if (!text) return null;

  if (text.startsWith("0x")) {
    const hex = parseHex(text.slice(2));
    if (hex !== null) return hex;
  }

  if (text.length === 4) {
    const hex = parseHex(text);
    if (hex !== null) return hex;
  }

  return parseDecimal(text) ?? parseHex(text);
}

/**
 * Raw descriptor as reported by a USB event source. Different backends use
 * different key names for the same field.
 */
export type RawUsbDescriptor = Readonly<Record<string, unknown>>;

const VENDOR_KEYS = ["ID_VENDOR_ID", "idVendor", "vendor_id", "vendorId"] as const;
const PRODUCT_KEYS = ["ID_MODEL_ID", "idProduct", "product_id", "productId"] as const;

function firstPresent(info: RawUsbDescriptor, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = info[key];
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return null;
}

/**
 * Pick and normalize vendor/product ids from a raw descriptor
 */
export function readUsbIds(info: RawUsbDescriptor): { vendorId: number | null; productId: number | null } {
  return {
    vendorId: normalizeUsbId(firstPresent(info, VENDOR_KEYS)),
    productId: normalizeUsbId(firstPresent(info, PRODUCT_KEYS)),
  };
}
