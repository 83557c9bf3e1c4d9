// Text payloads: strict UTF-8, 7-bit ASCII, lone surrogate rejection

import { MarshalError, ERR_INVALID_TEXT } from "./errors";

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

// A high surrogate not followed by a low one, or a low one not preceded by a high one.
const LONE_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

/** Throws unless every surrogate code unit in `s` belongs to a pair. */
export function checkSurrogates(s: string): void {
  const m = LONE_SURROGATE.exec(s);
  if (m !== null) {
    const unit = m[0].charCodeAt(0).toString(16);
    throw new MarshalError(ERR_INVALID_TEXT, `lone surrogate \\u${unit} at index ${m.index}`);
  }
}

/** Decode a payload as UTF-8 scalar values. */
export function decodeUtf8(bytes: Uint8Array, offset?: number): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new MarshalError(ERR_INVALID_TEXT, "invalid utf8", offset);
  }
}

/** Decode a payload that must be 7-bit ASCII. */
export function decodeAscii(bytes: Buffer, offset?: number): string {
  for (const b of bytes) {
    if (b >= 0x80) throw new MarshalError(ERR_INVALID_TEXT, "non-ascii byte in ascii string", offset);
  }
  return bytes.toString("latin1");
}

export function isAscii(s: string): boolean {
  return /^[\x00-\x7f]*$/.test(s);
}

/** UTF-8 bytes of a string that must not contain lone surrogates. */
export function encodeUtf8(s: string): Buffer {
  checkSurrogates(s);
  return Buffer.from(s, "utf8");
}
