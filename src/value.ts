// Value model: a closed union of every kind the format can carry

import { MarshalError, ERR_TYPE } from "./errors";
import { hashKey } from "./keys";

export interface NoneValue { readonly kind: "none" }
export interface StopIterationValue { readonly kind: "stopIteration" }
export interface EllipsisValue { readonly kind: "ellipsis" }
/** The reserved `?` marker. Representable, but neither decodable nor encodable. */
export interface UnknownValue { readonly kind: "unknown" }

export interface BoolValue {
  readonly kind: "bool";
  readonly value: boolean;
}

export interface IntValue {
  readonly kind: "int";
  readonly value: bigint;
}

export interface FloatValue {
  readonly kind: "float";
  readonly value: number;
}

export interface ComplexValue {
  readonly kind: "complex";
  readonly real: number;
  readonly imag: number;
}

export interface BytesValue {
  readonly kind: "bytes";
  readonly value: Buffer;
}

export interface StrValue {
  readonly kind: "str";
  readonly value: string;
  /** Interned strings are always backreference targets. */
  readonly interned: boolean;
}

export interface TupleValue {
  readonly kind: "tuple";
  readonly items: readonly Value[];
}

export interface ListValue {
  readonly kind: "list";
  readonly items: readonly Value[];
}

export interface SetValue {
  readonly kind: "set";
  readonly items: readonly Value[];
}

export interface FrozenSetValue {
  readonly kind: "frozenset";
  readonly items: readonly Value[];
}

export type DictEntry = readonly [key: Value, value: Value];

export interface DictValue {
  readonly kind: "dict";
  readonly entries: readonly DictEntry[];
}

/**
 * A compiled unit: bytecode plus the metadata needed to run it. Fields are
 * listed in wire order; `posonlyargcount` is only on the wire for layouts that
 * carry it.
 */
export interface CodeValue {
  readonly kind: "code";
  readonly argcount: number;
  readonly posonlyargcount: number;
  readonly kwonlyargcount: number;
  readonly nlocals: number;
  readonly stacksize: number;
  readonly flags: number;
  readonly code: BytesValue;
  readonly consts: TupleValue;
  readonly names: TupleValue;
  readonly varnames: TupleValue;
  readonly freevars: TupleValue;
  readonly cellvars: TupleValue;
  readonly filename: StrValue;
  readonly name: StrValue;
  readonly firstlineno: number;
  /** Line-number table, kept opaque. */
  readonly lnotab: BytesValue;
}

export type Value =
  | NoneValue
  | BoolValue
  | StopIterationValue
  | EllipsisValue
  | IntValue
  | FloatValue
  | ComplexValue
  | BytesValue
  | StrValue
  | TupleValue
  | ListValue
  | DictValue
  | SetValue
  | FrozenSetValue
  | CodeValue
  | UnknownValue;

export type ValueKind = Value["kind"];

export type SequenceValue = TupleValue | ListValue | SetValue | FrozenSetValue;

// ────────── singletons ──────────

export const NONE: NoneValue = Object.freeze<NoneValue>({ kind: "none" });
export const TRUE: BoolValue = Object.freeze<BoolValue>({ kind: "bool", value: true });
export const FALSE: BoolValue = Object.freeze<BoolValue>({ kind: "bool", value: false });
export const STOP_ITERATION: StopIterationValue = Object.freeze<StopIterationValue>({ kind: "stopIteration" });
export const ELLIPSIS: EllipsisValue = Object.freeze<EllipsisValue>({ kind: "ellipsis" });
export const UNKNOWN: UnknownValue = Object.freeze<UnknownValue>({ kind: "unknown" });

/** Kinds represented by one shared object; never written with the reference flag. */
export function isSingleton(v: Value): v is NoneValue | BoolValue | StopIterationValue | EllipsisValue {
  return v.kind === "none" || v.kind === "bool" || v.kind === "stopIteration" || v.kind === "ellipsis";
}

// ────────── constructors ──────────

export function bool(b: boolean): BoolValue {
  return b ? TRUE : FALSE;
}

export function int(n: bigint | number): IntValue {
  if (typeof n === "number" && !Number.isSafeInteger(n)) {
    throw new MarshalError(ERR_TYPE, `not a safe integer: ${n}`);
  }
  const v: IntValue = { kind: "int", value: BigInt(n) };
  return Object.freeze(v);
}

export function float(x: number): FloatValue {
  const v: FloatValue = { kind: "float", value: x };
  return Object.freeze(v);
}

export function complex(real: number, imag: number): ComplexValue {
  const v: ComplexValue = { kind: "complex", real, imag };
  return Object.freeze(v);
}

/** Wraps `data` without copying. */
export function bytes(data: Uint8Array | string): BytesValue {
  const value = typeof data === "string"
    ? Buffer.from(data, "latin1")
    : Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  const v: BytesValue = { kind: "bytes", value };
  return Object.freeze(v);
}

export function str(value: string, interned = false): StrValue {
  const v: StrValue = { kind: "str", value, interned };
  return Object.freeze(v);
}

export function tuple(items: Iterable<Value>): TupleValue {
  const v: TupleValue = { kind: "tuple", items: Object.freeze([...items]) };
  return Object.freeze(v);
}

export function list(items: Iterable<Value>): ListValue {
  const v: ListValue = { kind: "list", items: Object.freeze([...items]) };
  return Object.freeze(v);
}

export function set(items: Iterable<Value>): SetValue {
  const members: Value[] = [];
  const seen = new Set<string>();
  for (const it of items) addMember(members, seen, it);
  const v: SetValue = { kind: "set", items: Object.freeze(members) };
  return Object.freeze(v);
}

export function frozenset(items: Iterable<Value>): FrozenSetValue {
  const members: Value[] = [];
  const seen = new Set<string>();
  for (const it of items) addMember(members, seen, it);
  const v: FrozenSetValue = { kind: "frozenset", items: Object.freeze(members) };
  return Object.freeze(v);
}

/** Later entries for an equal key replace the value and keep the first position. */
export function dict(entries: Iterable<readonly [Value, Value]>): DictValue {
  const out: DictEntry[] = [];
  const index = new Map<string, number>();
  for (const [k, val] of entries) putEntry(out, index, k, val);
  const v: DictValue = { kind: "dict", entries: Object.freeze(out) };
  return Object.freeze(v);
}

export interface CodeFields {
  argcount?: number;
  posonlyargcount?: number;
  kwonlyargcount?: number;
  nlocals?: number;
  stacksize?: number;
  flags?: number;
  code: BytesValue;
  consts?: TupleValue;
  names?: TupleValue;
  varnames?: TupleValue;
  freevars?: TupleValue;
  cellvars?: TupleValue;
  filename: StrValue;
  name: StrValue;
  firstlineno?: number;
  lnotab?: BytesValue;
}

const EMPTY_TUPLE = tuple([]);
const EMPTY_BYTES = bytes(Buffer.alloc(0));

export function code(fields: CodeFields): CodeValue {
  const v: CodeValue = {
    kind: "code",
    argcount: int32Field("argcount", fields.argcount ?? 0),
    posonlyargcount: int32Field("posonlyargcount", fields.posonlyargcount ?? 0),
    kwonlyargcount: int32Field("kwonlyargcount", fields.kwonlyargcount ?? 0),
    nlocals: int32Field("nlocals", fields.nlocals ?? 0),
    stacksize: int32Field("stacksize", fields.stacksize ?? 0),
    flags: uint32Field("flags", fields.flags ?? 0),
    code: fields.code,
    consts: fields.consts ?? EMPTY_TUPLE,
    names: stringTuple("names", fields.names ?? EMPTY_TUPLE),
    varnames: stringTuple("varnames", fields.varnames ?? EMPTY_TUPLE),
    freevars: stringTuple("freevars", fields.freevars ?? EMPTY_TUPLE),
    cellvars: stringTuple("cellvars", fields.cellvars ?? EMPTY_TUPLE),
    filename: fields.filename,
    name: fields.name,
    firstlineno: int32Field("firstlineno", fields.firstlineno ?? 0),
    lnotab: fields.lnotab ?? EMPTY_BYTES,
  };
  return Object.freeze(v);
}

function int32Field(field: string, n: number): number {
  if (!Number.isInteger(n) || n < -0x8000_0000 || n > 0x7fff_ffff) {
    throw new MarshalError(ERR_TYPE, `code ${field} must be a 32-bit integer`);
  }
  return n;
}

function uint32Field(field: string, n: number): number {
  if (!Number.isInteger(n) || n < 0 || n > 0xffff_ffff) {
    throw new MarshalError(ERR_TYPE, `code ${field} must be an unsigned 32-bit integer`);
  }
  return n;
}

function stringTuple(field: string, t: TupleValue): TupleValue {
  for (const it of t.items) {
    if (it.kind !== "str") throw new MarshalError(ERR_TYPE, `code ${field} must hold only strings`);
  }
  return t;
}

// ────────── incremental container building ──────────

/** Append `member` unless an equal one is present. Returns false for a duplicate. */
export function addMember(items: Value[], seen: Set<string>, member: Value): boolean {
  const k = hashKey(member);
  if (seen.has(k)) return false;
  seen.add(k);
  items.push(member);
  return true;
}

/** Insert or overwrite. Returns true when the key was already present. */
export function putEntry(entries: DictEntry[], index: Map<string, number>, key: Value, value: Value): boolean {
  const k = hashKey(key);
  const at = index.get(k);
  if (at === undefined) {
    index.set(k, entries.length);
    entries.push([key, value]);
    return false;
  }
  entries[at] = [entries[at][0], value];
  return true;
}

// ────────── accessors ──────────

/** Look a key up the way the mapping was built (numeric kinds that compare equal share a key). */
export function dictGet(d: DictValue, key: Value): Value | undefined {
  const k = hashKey(key);
  for (const [ek, ev] of d.entries) {
    if (hashKey(ek) === k) return ev;
  }
  return undefined;
}

/** The texts of a tuple of strings (code object name groups). */
export function tupleStrings(t: TupleValue): string[] {
  return t.items.map(it => {
    if (it.kind !== "str") throw new MarshalError(ERR_TYPE, `expected str, got ${it.kind}`);
    return it.value;
  });
}

// ────────── code flags ──────────

export const CodeFlag = {
  OPTIMIZED: 0x1,
  NEWLOCALS: 0x2,
  VARARGS: 0x4,
  VARKEYWORDS: 0x8,
  NESTED: 0x10,
  GENERATOR: 0x20,
  NOFREE: 0x40,
  COROUTINE: 0x80,
  ITERABLE_COROUTINE: 0x100,
  ASYNC_GENERATOR: 0x200,
  GENERATOR_ALLOWED: 0x1000,
  FUTURE_DIVISION: 0x2000,
  FUTURE_ABSOLUTE_IMPORT: 0x4000,
  FUTURE_WITH_STATEMENT: 0x8000,
  FUTURE_PRINT_FUNCTION: 0x10000,
  FUTURE_UNICODE_LITERALS: 0x20000,
  FUTURE_BARRY_AS_BDFL: 0x40000,
  FUTURE_GENERATOR_STOP: 0x80000,
  FUTURE_ANNOTATIONS: 0x100000,
} as const;

/** Names of the known bits set in `flags`, lowest bit first. Unknown bits are ignored. */
export function codeFlagNames(flags: number): string[] {
  return Object.entries(CodeFlag)
    .filter(([, bit]) => (flags & bit) !== 0)
    .map(([name]) => name);
}
