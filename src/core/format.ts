const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human readable byte count, binary units: 800 -> "800 B", 1536 -> "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (Math.abs(value) >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${BYTE_UNITS[0]}` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function formatPercent(part: number, whole: number): string {
  if (whole === 0) return '0.00';
  return ((100 * part) / whole).toFixed(2);
}
