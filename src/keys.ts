// Hash keys and structural equality for values

import { createHash } from "crypto";
import type { Value } from "./value";
import { MarshalError, ERR_UNHASHABLE } from "./errors";

/**
 * `lookup` keys collide where the source language's `==` does (`1`, `1.0`,
 * `True`). `exact` keys collide where `valueEquals` does.
 */
type KeyMode = "lookup" | "exact";

interface KeyContext {
  readonly mode: KeyMode;
  readonly visiting: Set<Value>;
  /** Set once a container still being decoded was visited; such keys are not cached. */
  partial: boolean;
}

const cache: Record<KeyMode, WeakMap<Value, string>> = {
  lookup: new WeakMap(),
  exact: new WeakMap(),
};

// NaN is not equal to itself, so a NaN key only matches the object that carries it.
const nanIds = new WeakMap<Value, number>();
let nextNanId = 0;

function nanKey(v: Value): string {
  let id = nanIds.get(v);
  if (id === undefined) {
    id = nextNanId++;
    nanIds.set(v, id);
  }
  return "nan#" + id;
}

// Longer composite keys are replaced by their digest, so shared subtrees keep keys small.
const MAX_INLINE_KEY = 64;

function compact(key: string): string {
  if (key.length <= MAX_INLINE_KEY) return key;
  return "#" + createHash("sha256").update(key).digest("hex");
}

function lookupNumber(x: number): string {
  if (Number.isInteger(x)) return "i:" + BigInt(x).toString();
  return "f:" + String(x);
}

function exactNumber(x: number): string {
  return Object.is(x, -0) ? "-0" : String(x);
}

function scalarKey(v: Value, mode: KeyMode): string | undefined {
  const exact = mode === "exact";
  switch (v.kind) {
    case "none": return "N";
    case "stopIteration": return "S";
    case "ellipsis": return "E";
    case "bool":
      if (exact) return v.value ? "B:1" : "B:0";
      return v.value ? "i:1" : "i:0";
    case "int": return "i:" + v.value.toString();
    case "float":
      if (exact) return "f:" + exactNumber(v.value);
      return Number.isNaN(v.value) ? "f:" + nanKey(v) : lookupNumber(v.value);
    case "complex":
      if (exact) return "c:" + exactNumber(v.real) + ":" + exactNumber(v.imag);
      if (Number.isNaN(v.real) || Number.isNaN(v.imag)) return "c:" + nanKey(v);
      if (v.imag === 0) return lookupNumber(v.real);
      return "c:" + String(v.real) + ":" + String(v.imag);
    case "str": return "s" + JSON.stringify(v.value);
    case "bytes": return "b:" + v.value.toString("hex");
    case "list":
    case "dict":
    case "set":
    case "unknown":
      throw new MarshalError(ERR_UNHASHABLE, `unhashable type: ${v.kind}`);
    default:
      return undefined;
  }
}

function keyOf(v: Value, ctx: KeyContext): string {
  const scalar = scalarKey(v, ctx.mode);
  if (scalar !== undefined) return scalar;

  const memo = cache[ctx.mode];
  const hit = memo.get(v);
  if (hit !== undefined) return hit;
  if (ctx.visiting.has(v)) throw new MarshalError(ERR_UNHASHABLE, `self-referential ${v.kind}`);
  ctx.visiting.add(v);
  const outer = ctx.partial;
  ctx.partial = !Object.isFrozen(v);

  let key: string;
  switch (v.kind) {
    case "code": {
      const parts = [
        v.argcount, v.posonlyargcount, v.kwonlyargcount, v.nlocals, v.stacksize, v.flags, v.firstlineno,
      ].map(String);
      for (const field of [v.code, v.consts, v.names, v.varnames, v.freevars, v.cellvars, v.filename, v.name, v.lnotab]) {
        parts.push(keyOf(field, ctx));
      }
      key = compact("code(" + parts.join(",") + ")");
      break;
    }
    case "tuple":
    case "frozenset": {
      const parts: string[] = [];
      for (const it of v.items) parts.push(keyOf(it, ctx));
      key = compact(v.kind === "tuple" ? "t(" + parts.join(",") + ")" : "F{" + parts.sort().join(",") + "}");
      break;
    }
    default:
      throw new MarshalError(ERR_UNHASHABLE, `unhashable type: ${v.kind}`);
  }

  ctx.visiting.delete(v);
  if (!ctx.partial) memo.set(v, key);
  ctx.partial = outer || ctx.partial;
  return key;
}

function keyIn(mode: KeyMode, v: Value): string {
  return keyOf(v, { mode, visiting: new Set(), partial: false });
}

/**
 * Key under which `v` is stored in a dict or set. Values that compare equal
 * in the source language share a key: `True`, `1` and `1.0` collide. A NaN
 * only matches the object that holds it, as in the source language.
 * Keys of finished values are cached by identity.
 */
export function hashKey(v: Value): string {
  return keyIn("lookup", v);
}

export function isHashable(v: Value): boolean {
  try {
    hashKey(v);
    return true;
  } catch (err) {
    if (err instanceof MarshalError && err.code === ERR_UNHASHABLE) return false;
    throw err;
  }
}

// ────────── structural equality ──────────

type Pair = [Value, Value];

/** Set members are hashable, so they can be matched by exact key. */
function sameMembers(a: readonly Value[], b: readonly Value[]): boolean {
  if (a.length !== b.length) return false;
  const counts = new Map<string, number>();
  for (const m of b) {
    const k = keyIn("exact", m);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  for (const m of a) {
    const k = keyIn("exact", m);
    const n = counts.get(k) ?? 0;
    if (n === 0) return false;
    counts.set(k, n - 1);
  }
  return true;
}

/** Compare the scalar parts of `a` and `b`, queueing child pairs onto `work`. */
function shallowEquals(a: Value, b: Value, work: Pair[]): boolean {
  switch (a.kind) {
    case "none":
    case "stopIteration":
    case "ellipsis":
    case "unknown":
      return true;
    case "bool":
      return b.kind === "bool" && a.value === b.value;
    case "int":
      return b.kind === "int" && a.value === b.value;
    case "str":
      return b.kind === "str" && a.value === b.value;
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value);
    case "complex":
      return b.kind === "complex" && Object.is(a.real, b.real) && Object.is(a.imag, b.imag);
    case "bytes":
      return b.kind === "bytes" && a.value.equals(b.value);
    case "tuple":
    case "list": {
      if ((b.kind !== "tuple" && b.kind !== "list") || a.items.length !== b.items.length) return false;
      for (let i = a.items.length - 1; i >= 0; i--) work.push([a.items[i], b.items[i]]);
      return true;
    }
    case "set":
    case "frozenset":
      return (b.kind === "set" || b.kind === "frozenset") && sameMembers(a.items, b.items);
    case "dict": {
      if (b.kind !== "dict" || a.entries.length !== b.entries.length) return false;
      const byKey = new Map<string, Value>();
      for (const [k, val] of b.entries) byKey.set(keyIn("exact", k), val);
      for (const [k, val] of a.entries) {
        const other = byKey.get(keyIn("exact", k));
        if (other === undefined) return false;
        work.push([val, other]);
      }
      return true;
    }
    case "code":
      if (b.kind !== "code"
        || a.argcount !== b.argcount
        || a.posonlyargcount !== b.posonlyargcount
        || a.kwonlyargcount !== b.kwonlyargcount
        || a.nlocals !== b.nlocals
        || a.stacksize !== b.stacksize
        || a.flags !== b.flags
        || a.firstlineno !== b.firstlineno) {
        return false;
      }
      work.push(
        [a.lnotab, b.lnotab], [a.name, b.name], [a.filename, b.filename],
        [a.cellvars, b.cellvars], [a.freevars, b.freevars], [a.varnames, b.varnames],
        [a.names, b.names], [a.consts, b.consts], [a.code, b.code],
      );
      return true;
  }
}

/**
 * Structural equality. Kinds must match, floats compare with `Object.is`,
 * sets and dicts ignore order, the interned flag of strings is ignored.
 * A pair already under comparison is taken as equal, so cyclic values terminate.
 */
export function valueEquals(a: Value, b: Value): boolean {
  const seen = new Map<Value, Set<Value>>();
  const work: Pair[] = [[a, b]];
  let pair: Pair | undefined;
  while ((pair = work.pop()) !== undefined) {
    const [x, y] = pair;
    if (x === y) continue;
    if (x.kind !== y.kind) return false;
    let partners = seen.get(x);
    if (partners?.has(y)) continue;
    if (!partners) {
      partners = new Set();
      seen.set(x, partners);
    }
    partners.add(y);
    if (!shallowEquals(x, y, work)) return false;
  }
  return true;
}
