import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { ALLOWED_POOL_OVERFLOW_MODES, BOOLEAN_TRUE_VALUES } from './config.constants';
import type { PoolOverflow } from '../spamd/pool/connection-pool';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ensure integer for configuration values (ports, timeouts, sizes)
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * Returns the provided value if present, otherwise returns the default.
 * Used for optional string configuration values.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Reads a PEM file such as the CA bundle used to verify spamd's certificate.
 *
 * Returns undefined when no path is given or the file does not exist yet.
 *
 * @throws {Error} If the file exists but holds no PEM block
 */
export function readTlsBuffer(path: string | undefined): Buffer | undefined {
  if (!path) {
    return undefined;
  }
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    return undefined;
  }

  const buffer = readFileSync(fullPath);

  const content = buffer.toString();
  if (!content.includes('-----BEGIN') || !content.includes('-----END')) {
    throw new Error(`Invalid certificate format in ${path}: File must be in PEM format`);
  }

  return buffer;
}

/**
 * Parses the pool overflow mode (`queue` or `fail`), case-insensitively.
 *
 * @throws {Error} If the value is neither mode
 */
export function parsePoolOverflow(value: string | undefined, defaultValue: PoolOverflow): PoolOverflow {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  const mode = ALLOWED_POOL_OVERFLOW_MODES.find((allowed) => allowed === normalized);
  if (!mode) {
    throw new Error(`Invalid pool overflow mode: "${value}" (must be one of ${ALLOWED_POOL_OVERFLOW_MODES.join(', ')})`);
  }
  return mode;
}
