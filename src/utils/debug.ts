/**
 * Debug utilities
 * Console logging with level prefixes; debug output is opt-in via CLI_IMAGE_DEBUG
 */

export const DEBUG = isEnabled(process.env.CLI_IMAGE_DEBUG);

function isEnabled(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function debug(message: string, data?: unknown): void {
  if (DEBUG) {
    console.log(`[DEBUG] ${message}`, data ?? '');
  }
}

export function warn(message: string, data?: unknown): void {
  console.warn(`[WARN] ${message}`, data ?? '');
}

export function error(message: string, error?: unknown): void {
  console.error(`[ERROR] ${message}`, error ?? '');
}
