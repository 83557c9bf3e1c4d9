// Floats and complex numbers: decimal text (versions 0-1) or IEEE-754 binary64 (version 2+)

import type { ByteReader, ByteWriter } from "./cursor";
import { MarshalError, ERR_INVALID_FLOAT, ERR_INVALID_TEXT } from "./errors";

const PRECISION = 17;

/** printf-style `%.17g`. Non-finite values become `inf`, `-inf` and `nan`. */
export function formatFloat(x: number): string {
  if (Number.isNaN(x)) return "nan";
  if (!Number.isFinite(x)) return x > 0 ? "inf" : "-inf";
  if (x === 0) return Object.is(x, -0) ? "-0" : "0";

  const sign = x < 0 ? "-" : "";
  const [mant, expText] = Math.abs(x).toExponential(PRECISION - 1).split("e");
  const exp = Number(expText);
  const digits = mant.replace(".", "");

  if (exp < -4 || exp >= PRECISION) {
    const frac = digits.slice(1).replace(/0+$/, "");
    const e = Math.abs(exp).toString().padStart(2, "0");
    return `${sign}${digits[0]}${frac ? "." + frac : ""}e${exp < 0 ? "-" : "+"}${e}`;
  }
  if (exp < 0) {
    const frac = ("0".repeat(-exp - 1) + digits).replace(/0+$/, "");
    return `${sign}0.${frac}`;
  }
  const int = digits.slice(0, exp + 1);
  const frac = digits.slice(exp + 1).replace(/0+$/, "");
  return `${sign}${int}${frac ? "." + frac : ""}`;
}

const FLOAT_RE = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf(?:inity)?|nan)$/i;

/** Parse decimal float text, accepting the same spellings as the writer side's language. */
export function parseFloatText(text: string): number {
  if (!FLOAT_RE.test(text)) throw new MarshalError(ERR_INVALID_FLOAT, `bad float text: ${JSON.stringify(text)}`);
  const neg = text[0] === "-";
  const body = text.replace(/^[+-]/, "").toLowerCase();
  if (body.startsWith("inf")) return neg ? -Infinity : Infinity;
  if (body === "nan") return NaN;
  return Number(text);
}

export function readFloatText(r: ByteReader): number {
  const start = r.position;
  const n = r.readU8();
  const raw = r.readExact(n);
  for (const b of raw) {
    if (b >= 0x80) throw new MarshalError(ERR_INVALID_TEXT, "non-ascii float text", start);
  }
  try {
    return parseFloatText(raw.toString("latin1"));
  } catch (err) {
    if (err instanceof MarshalError) throw new MarshalError(err.code, err.message, start);
    throw err;
  }
}

export function writeFloatText(w: ByteWriter, x: number): void {
  const text = formatFloat(x);
  w.writeU8(text.length);
  w.writeBytes(Buffer.from(text, "latin1"));
}

export function readFloatBinary(r: ByteReader): number {
  return r.readF64LE();
}

export function writeFloatBinary(w: ByteWriter, x: number): void {
  w.writeF64LE(x);
}
