/**
 * Input Validation Utilities
 * Shared validation helpers for all plugins
 */

/**
 * Validates a positive integer
 */
export function validatePositiveInt(
  value: string | number | undefined,
  defaultValue: number
): number {
  const num = typeof value === 'string' ? parseInt(value, 10) : (value ?? defaultValue);
  if (isNaN(num) || num < 1) {
    return defaultValue;
  }
  return num;
}

/**
 * Like validatePositiveInt, but an absent or invalid value stays undefined
 */
export function parseOptionalPositiveInt(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const num = typeof value === 'string' ? Number(value.trim()) : value;
  if (!Number.isInteger(num) || num < 1) {
    return undefined;
  }
  return num;
}

/**
 * Validates a non-negative integer, e.g. a delay in milliseconds
 */
export function validateNonNegativeInt(
  value: string | number | undefined,
  defaultValue: number
): number {
  const num = typeof value === 'string' ? parseInt(value, 10) : (value ?? defaultValue);
  if (isNaN(num) || num < 0) {
    return defaultValue;
  }
  return num;
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
  const match = allowed.find((candidate) => candidate === value);
  return match ?? defaultValue;
}

/**
 * Splits a comma-separated list, dropping blanks
 */
export function parseCsvList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

/**
 * Masks a secret for display, keeping only the first and last characters
 */
export function maskSecret(value: string, visible = 4): string {
  if (value.length <= visible * 2) {
    return '*'.repeat(value.length);
  }
  return `${value.slice(0, visible)}${'*'.repeat(value.length - visible * 2)}${value.slice(-visible)}`;
}
