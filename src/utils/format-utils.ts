const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Format bytes to human-readable size
 * Example: 5046586573 → "4.7 GB"
 */
export function formatBytes(bytes: number): string {
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < SIZE_UNITS.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${SIZE_UNITS[unitIndex]}`;
}

/**
 * Parse a human-readable size back to bytes (binary multiples).
 * Accepts "4.7 GB", "4.7GB", "512 mb", "7 B". Returns null when unrecognized.
 */
export function parseSize(text: string): number | null {
  const match = text.trim().match(/^(\d+(?:\.\d+)?)\s*([KMGT]?B)$/i);
  if (!match) return null;

  const value = parseFloat(match[1]);
  const unitIndex = SIZE_UNITS.indexOf(match[2].toUpperCase());
  if (isNaN(value) || unitIndex < 0) return null;

  return Math.round(value * Math.pow(1024, unitIndex));
}

/**
 * Format a date to a short string (no time)
 * Example: "Nov 20"
 */
export function formatDateShort(date: Date): string {
  return date.toLocaleString('en-US', {
    month: 'short',
    day: 'numeric',
  });
}

/**
 * Describe how long ago a timestamp was
 * Example: "Today", "Yesterday", "3 days ago", "2 weeks ago"
 */
export function formatRelativeTime(date: Date, now: Date): string {
  const days = Math.floor((now.getTime() - date.getTime()) / 86_400_000);

  if (days <= 0) return 'Today';
  if (days === 1) return 'Yesterday';
  if (days < 7) return `${days} days ago`;
  if (days < 30) {
    const weeks = Math.floor(days / 7);
    return `${weeks} week${weeks === 1 ? '' : 's'} ago`;
  }
  if (days < 365) {
    const months = Math.floor(days / 30);
    return `${months} month${months === 1 ? '' : 's'} ago`;
  }
  const years = Math.floor(days / 365);
  return `${years} year${years === 1 ? '' : 's'} ago`;
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}
