/**
 * Render bytes as space-separated uppercase hex pairs, e.g. "5A 04 3A 00"
 */
export function formatHex(data: Uint8Array): string {
  return Array.from(data, (byte) =>
    byte.toString(16).padStart(2, "0").toUpperCase(),
  ).join(" ");
}
