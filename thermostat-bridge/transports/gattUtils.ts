/**
 * Helpers shared by the concrete BLE stacks
 */

const SIG_BASE_UUID = /^0000([0-9a-f]{4})00001000800000805f9b34fb$/;

/**
 * Canonical characteristic key: lowercase, no dashes, and 16-bit SIG uuids in
 * their short form (noble reports '2a29', BlueZ the full 128-bit form).
 */
export function normalizeUuid(uuid: string): string {
  const compact = uuid.replace(/-/g, '').toLowerCase();
  const match = SIG_BASE_UUID.exec(compact);
  return match ? match[1] : compact;
}

/** Raw manufacturer-specific data: u16 LE company id followed by the payload */
export function splitManufacturerData(raw: Buffer | undefined | null): { companyId: number; payload: Buffer } | null {
  if (!raw || raw.length < 2) return null;
  return { companyId: raw.readUInt16LE(0), payload: raw.subarray(2) };
}

export function sameAddress(a: string, b: string): boolean {
  return a.replace(/[:-]/g, '').toLowerCase() === b.replace(/[:-]/g, '').toLowerCase();
}
