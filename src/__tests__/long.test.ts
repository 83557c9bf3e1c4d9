import { describe, expect, test } from "vitest";
import { ByteReader, ByteWriter } from "../cursor";
import { ERR_EOF, ERR_INVALID_LONG } from "../errors";
import { longFromDigits, longToDigits, readLong, writeLong } from "../long";
import { b, thrown } from "./helpers";

describe("digits", () => {
  test("zero has no digits", () => {
    expect(longToDigits(0n)).toEqual({ size: 0, digits: [] });
    expect(longFromDigits(0, [])).toBe(0n);
  });

  test("splits into 15-bit digits, least significant first", () => {
    expect(longToDigits(2n ** 64n)).toEqual({ size: 5, digits: [0, 0, 0, 0, 16] });
    expect(longToDigits(-(2n ** 31n))).toEqual({ size: -3, digits: [0, 0, 2] });
    expect(longToDigits(0x7fffn)).toEqual({ size: 1, digits: [0x7fff] });
  });

  test("rebuilds values with any digit count", () => {
    const big = -(3n ** 200n);
    const { size, digits } = longToDigits(big);
    expect(longFromDigits(size, digits)).toBe(big);
  });

  test("rejects digits out of range", () => {
    expect(thrown(() => longFromDigits(1, [0x8000])).code).toBe(ERR_INVALID_LONG);
    expect(thrown(() => longFromDigits(1, [-1])).code).toBe(ERR_INVALID_LONG);
  });

  test("rejects a zero top digit and a count mismatch", () => {
    expect(thrown(() => longFromDigits(2, [5, 0])).code).toBe(ERR_INVALID_LONG);
    expect(thrown(() => longFromDigits(3, [5, 1])).code).toBe(ERR_INVALID_LONG);
  });
});

describe("wire form", () => {
  test("writes size then digits", () => {
    const w = new ByteWriter();
    writeLong(w, 2n ** 64n);
    expect(w.finish()).toEqual(b("\x05\x00\x00\x00\x00\x00\x00\x00\x00\x00\x00\x00\x10\x00"));
  });

  test("negative values carry a negative size", () => {
    const w = new ByteWriter();
    writeLong(w, -(2n ** 64n));
    expect(w.finish().subarray(0, 4)).toEqual(b("\xfb\xff\xff\xff"));
  });

  test("reads a nine-digit value", () => {
    const r = new ByteReader(b("\t\x00\x00\x00\x01\x00\x00\x00\x00\x00\x00\x00\xf0\x7f\xff\x7f\xff\x7f\xff\x7f?\x00"));
    expect(readLong(r)).toBe(85070591730234615847396907784232501249n);
  });

  test("unnormalized input reports the size offset", () => {
    const r = new ByteReader(b("xx\x02\x00\x00\x00\x00\x00\x00\x00"));
    r.readU16LE();
    const err = thrown(() => readLong(r));
    expect(err.code).toBe(ERR_INVALID_LONG);
    expect(err.offset).toBe(2);
  });

  test("short digit data is truncation", () => {
    const r = new ByteReader(b("\x05\x00\x00\x00\x00\x00\x00\x00\x00\x00\x00\x00 "));
    expect(thrown(() => readLong(r)).code).toBe(ERR_EOF);
  });
});
