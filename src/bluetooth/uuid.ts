const BASE_UUID_SUFFIX = "00001000800000805f9b34fb";

/**
 * Normalizes a GATT UUID to 32 lower-case hex digits without dashes, expanding
 * 16-bit short forms ("baba") against the Bluetooth base UUID.
 */
export function normalizeUuid(uuid: string): string {
  const hex = uuid.toLowerCase().replace(/-/g, "");
  if (hex.length === 4) return `0000${hex}${BASE_UUID_SUFFIX}`;
  if (hex.length === 8) return `${hex}${BASE_UUID_SUFFIX}`;
  return hex;
}

/**
 * Returns the short form for UUIDs built on the base UUID, which is how noble
 * reports standard-style services, or the dashless long form otherwise.
 */
export function shortenUuid(uuid: string): string {
  const full = normalizeUuid(uuid);
  if (full.startsWith("0000") && full.endsWith(BASE_UUID_SUFFIX)) return full.slice(4, 8);
  return full;
}

export function sameUuid(a: string, b: string): boolean {
  return normalizeUuid(a) === normalizeUuid(b);
}
