/**
 * Display Formatting
 */

const MEGABYTE = 1024 * 1024;

/**
 * Format a byte count as megabytes with a fixed number of decimals
 */
export function formatMegabytes(bytes: number, decimals: number = 1): string {
  return `${(bytes / MEGABYTE).toFixed(decimals)} MB`;
}

/**
 * Mask a secret for logs, keeping its first 8 and last 4 characters
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 12) {
    return '****';
  }
  return `${secret.slice(0, 8)}...${secret.slice(-4)}`;
}

/**
 * Truncate a string for display, appending an ellipsis when cut
 */
export function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? `${value.slice(0, maxLength)}...` : value;
}
