import { describe, expect, test } from "vitest";
import { ByteReader, ByteWriter } from "../cursor";
import { ERR_EOF } from "../errors";
import { b, thrown } from "./helpers";

describe("ByteReader", () => {
  test("reads little-endian integers and tracks position", () => {
    const r = new ByteReader(b("\x01\x02\x03\x04\x05\xff\xff\xff\xff"));
    expect(r.readU8()).toBe(1);
    expect(r.readU16LE()).toBe(0x0302);
    expect(r.readU16LE()).toBe(0x0504);
    expect(r.position).toBe(5);
    expect(r.readI32LE()).toBe(-1);
    expect(r.remaining).toBe(0);
  });

  test("reads 64-bit values", () => {
    const r = new ByteReader(b("\xfe\xdc\xba\x98\x76\x54\x32\x10\x00\x00\x00\x00\x00\x00\xf8?"));
    expect(r.readI64LE()).toBe(0x1032547698badcfen);
    expect(r.readF64LE()).toBe(1.5);
  });

  test("accepts a plain Uint8Array view", () => {
    const backing = new Uint8Array([9, 9, 0x2a, 0, 0, 0]);
    const r = new ByteReader(backing.subarray(2));
    expect(r.length).toBe(4);
    expect(r.readU32LE()).toBe(42);
  });

  test("reading past the end fails with the offset", () => {
    const r = new ByteReader(b("\x01\x02\x03"));
    r.readU8();
    const err = thrown(() => r.readU32LE());
    expect(err.code).toBe(ERR_EOF);
    expect(err.offset).toBe(1);
    expect(r.position).toBe(1);
  });

  test("readExact returns a copy", () => {
    const input = b("abcd");
    const r = new ByteReader(input);
    const out = r.readExact(3);
    input[0] = 0x7a;
    expect(out.toString("latin1")).toBe("abc");
    expect(r.remaining).toBe(1);
  });
});

describe("ByteWriter", () => {
  test("grows past its initial size", () => {
    const w = new ByteWriter(2);
    w.writeU8(0x41);
    w.writeI32LE(-2);
    w.writeU16LE(0x1234);
    w.writeBytes(b("xyz"));
    expect(w.position).toBe(10);
    expect(w.finish()).toEqual(b("A\xfe\xff\xff\xff\x34\x12xyz"));
  });

  test("writes 64-bit values", () => {
    const w = new ByteWriter();
    w.writeI64LE(-1n);
    w.writeF64LE(-2);
    w.writeU32LE(0xffff_ffff);
    expect(w.finish()).toEqual(b("\xff\xff\xff\xff\xff\xff\xff\xff\x00\x00\x00\x00\x00\x00\x00\xc0\xff\xff\xff\xff"));
  });
});
