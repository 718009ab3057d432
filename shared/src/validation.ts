/**
 * Input Validation Utilities
 * Helpers for reading and checking environment-sourced settings
 */

/**
 * Parse a comma-separated string into a trimmed, non-empty list.
 */
export function parseCsvList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Validates a port number
 */
export function validatePort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65535;
}

/**
 * Validates a positive integer
 */
export function validatePositiveInt(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 1;
}

/**
 * Inclusive range check that also rejects NaN
 */
export function validateRange(value: number, min: number, max: number): boolean {
  return !Number.isNaN(value) && value >= min && value <= max;
}

export function isPowerOfTwo(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

/**
 * Validates a string against an allowed list
 */
export function validateEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue?: T
): T | undefined {
  if (!value) {
    return defaultValue;
  }
  return allowed.find(candidate => candidate === value);
}

/**
 * Validates an absolute http(s) URL
 */
export function validateHttpUrl(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
