/**
 * Checked narrowing conversions for the archive's 32-bit fields.
 */
import { OverflowError } from '../errors.js';

export const UINT32_MAX = 0xFFFFFFFF;
export const INT32_MAX = 0x7FFFFFFF;
export const INT32_MIN = -0x80000000;

function toSafeNumber(value: number | bigint, domain: string): number {
  if (typeof value === 'bigint') {
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new OverflowError(value, domain);
    }
    return Number(value);
  }
  if (!Number.isInteger(value)) {
    throw new OverflowError(value, domain);
  }
  return value;
}

/**
 * Converts a value to an unsigned 32-bit integer.
 * @throws {OverflowError} If the value is negative, fractional or above 0xFFFFFFFF
 */
export function toUInt32(value: number | bigint): number {
  const n = toSafeNumber(value, 'uint32');
  if (n < 0 || n > UINT32_MAX) {
    throw new OverflowError(value, 'uint32');
  }
  return n;
}

/**
 * Converts a value to a signed 32-bit integer.
 * @throws {OverflowError} If the value is fractional or outside [-2^31, 2^31 - 1]
 */
export function toInt32(value: number | bigint): number {
  const n = toSafeNumber(value, 'int32');
  if (n < INT32_MIN || n > INT32_MAX) {
    throw new OverflowError(value, 'int32');
  }
  return n;
}
