// Arbitrary-precision integers: sign-magnitude, little-endian base 2^15 digits

import type { ByteReader, ByteWriter } from "./cursor";
import { MarshalError, ERR_INVALID_LONG, ERR_INVALID_LENGTH } from "./errors";
import { MAX_LENGTH } from "./constants";

export const LONG_SHIFT = 15;
export const LONG_MASK = (1 << LONG_SHIFT) - 1;

const SHIFT = BigInt(LONG_SHIFT);
const MASK = BigInt(LONG_MASK);

export interface LongDigits {
  /** Digit count; negative for negative values, 0 for zero. */
  size: number;
  digits: number[];
}

export function longToDigits(n: bigint): LongDigits {
  const negative = n < 0n;
  let mag = negative ? -n : n;
  const digits: number[] = [];
  while (mag > 0n) {
    digits.push(Number(mag & MASK));
    mag >>= SHIFT;
  }
  return { size: negative ? -digits.length : digits.length, digits };
}

/**
 * Rebuild an integer from its digit array. Every digit must fit in 15 bits
 * and the most significant one must be non-zero.
 */
export function longFromDigits(size: number, digits: readonly number[]): bigint {
  if (digits.length !== Math.abs(size)) {
    throw new MarshalError(ERR_INVALID_LONG, "digit count mismatch");
  }
  if (digits.length === 0) return 0n;
  let mag = 0n;
  for (let i = digits.length - 1; i >= 0; i--) {
    const d = digits[i];
    if (!Number.isInteger(d) || d < 0 || d > LONG_MASK) {
      throw new MarshalError(ERR_INVALID_LONG, `digit out of range: ${d}`);
    }
    mag = (mag << SHIFT) | BigInt(d);
  }
  if (digits[digits.length - 1] === 0) {
    throw new MarshalError(ERR_INVALID_LONG, "unnormalized long");
  }
  return size < 0 ? -mag : mag;
}

export function readLong(r: ByteReader): bigint {
  const start = r.position;
  const size = r.readI32LE();
  const count = Math.abs(size);
  r.require(count * 2, "long digits");
  const digits: number[] = new Array<number>(count);
  for (let i = 0; i < count; i++) digits[i] = r.readU16LE();
  try {
    return longFromDigits(size, digits);
  } catch (err) {
    if (err instanceof MarshalError) throw new MarshalError(err.code, err.message, start);
    throw err;
  }
}

export function writeLong(w: ByteWriter, n: bigint): void {
  const { size, digits } = longToDigits(n);
  if (digits.length > MAX_LENGTH) throw new MarshalError(ERR_INVALID_LENGTH, "long too large");
  w.writeI32LE(size);
  for (const d of digits) w.writeU16LE(d);
}
