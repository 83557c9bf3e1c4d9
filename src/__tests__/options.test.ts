import { describe, expect, test } from "vitest";
import { DEFAULT_VERSION, MAX_DEPTH, minVersionOf, isTypeCode, TYPE_REF, TYPE_SHORT_ASCII, TYPE_INT } from "../constants";
import { ERR_TYPE, ERR_VERSION, MarshalError } from "../errors";
import { silentLogger } from "../logger";
import { resolveOptions } from "../options";
import { thrown } from "./helpers";

describe("resolveOptions", () => {
  test("defaults", () => {
    expect(resolveOptions()).toEqual({
      version: DEFAULT_VERSION,
      maxDepth: MAX_DEPTH,
      hasPosOnlyArgCount: true,
      logger: silentLogger,
    });
  });

  test("a bare number is the version", () => {
    expect(resolveOptions(2).version).toBe(2);
  });

  test("rejects versions outside 0 to 4", () => {
    expect(thrown(() => resolveOptions(5)).code).toBe(ERR_VERSION);
    expect(thrown(() => resolveOptions({ version: 1.5 })).code).toBe(ERR_VERSION);
  });

  test("maxDepth must be a positive integer", () => {
    expect(thrown(() => resolveOptions({ maxDepth: 0 })).code).toBe(ERR_TYPE);
    expect(resolveOptions({ maxDepth: 10 }).maxDepth).toBe(10);
  });
});

describe("tags", () => {
  test("minimum versions", () => {
    expect(minVersionOf(TYPE_INT)).toBe(0);
    expect(minVersionOf(TYPE_REF)).toBe(3);
    expect(minVersionOf(TYPE_SHORT_ASCII)).toBe(4);
  });

  test("the flag bit is not part of the type code", () => {
    expect(isTypeCode(0x69)).toBe(true);
    expect(isTypeCode(0xe9)).toBe(false);
    expect(isTypeCode(0x62)).toBe(false);
  });
});

describe("MarshalError", () => {
  test("carries the code and offset", () => {
    const err = new MarshalError(ERR_TYPE, "bad field", 12);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("MarshalError");
    expect(err.message).toBe("bad field (at byte 12)");
    expect(err.offset).toBe(12);
    expect(new MarshalError(ERR_VERSION).message).toBe("ERR_VERSION");
  });
});
