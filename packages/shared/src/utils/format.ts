const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatFileSize(bytes: number): string {
  let value = bytes;
  for (let i = 0; i < SIZE_UNITS.length - 1; i++) {
    if (value < 1024) return `${value.toFixed(1)} ${SIZE_UNITS[i]}`;
    value /= 1024;
  }
  return `${value.toFixed(1)} ${SIZE_UNITS[SIZE_UNITS.length - 1]}`;
}

export function truncate(str: string, maxLen: number): string {
  if (!str) return '';
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 1) + '…';
}
