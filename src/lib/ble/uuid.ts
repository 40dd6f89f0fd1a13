/**
 * Normalize UUID for comparison
 * Handles both full 128-bit UUIDs and short 16/32-bit UUIDs
 * Short UUIDs use the Bluetooth Base UUID: 00000000-0000-1000-8000-00805f9b34fb
 */
export function normalizeUUID(uuid: string): string {
  const cleaned = uuid.replace(/-/g, "").toLowerCase();

  // Bluetooth Base UUID pattern: 0000XXXX-0000-1000-8000-00805f9b34fb
  const match = cleaned.match(/^0000([0-9a-f]{4})00001000800000805f9b34fb$/);
  if (match && match[1]) {
    return match[1];
  }

  return cleaned;
}
