import { MarshalError } from "../errors";
import type { Value, ValueKind } from "../value";

/** Bytes of a binary string literal, one char per byte. */
export const b = (s: string): Buffer => Buffer.from(s, "latin1");

export function thrown(fn: () => unknown): MarshalError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MarshalError) return err;
    throw err;
  }
  throw new Error("expected a MarshalError");
}

function isKind<K extends ValueKind>(v: Value, kind: K): v is Extract<Value, { kind: K }> {
  return v.kind === kind;
}

export function expectKind<K extends ValueKind>(v: Value, kind: K): Extract<Value, { kind: K }> {
  if (!isKind(v, kind)) throw new Error(`expected ${kind}, got ${v.kind}`);
  return v;
}
