// Marshal decoder: a tag-driven reader with an explicit container stack and backreferences

import {
  FLAG_REF, REF_FLAG_MIN_VERSION,
  TYPE_NULL, TYPE_NONE, TYPE_FALSE, TYPE_TRUE, TYPE_STOPITER, TYPE_ELLIPSIS,
  TYPE_INT, TYPE_INT64, TYPE_FLOAT, TYPE_BINARY_FLOAT, TYPE_COMPLEX, TYPE_BINARY_COMPLEX,
  TYPE_LONG, TYPE_STRING, TYPE_INTERNED, TYPE_REF, TYPE_TUPLE, TYPE_LIST, TYPE_DICT,
  TYPE_CODE, TYPE_UNICODE, TYPE_UNKNOWN, TYPE_SET, TYPE_FROZENSET, TYPE_ASCII,
  TYPE_ASCII_INTERNED, TYPE_SMALL_TUPLE, TYPE_SHORT_ASCII, TYPE_SHORT_ASCII_INTERNED,
  isTypeCode, minVersionOf,
} from "./constants";
import { ByteReader } from "./cursor";
import {
  MarshalError,
  ERR_BAD_REF, ERR_EOF, ERR_INVALID_LENGTH, ERR_RECURSION, ERR_TRAILING, ERR_TYPE,
  ERR_UNEXPECTED_NULL, ERR_UNKNOWN_TAG, ERR_UNSUPPORTED,
} from "./errors";
import { readFloatBinary, readFloatText } from "./float";
import { readLong } from "./long";
import { resolveOptions } from "./options";
import type { DecodeOptions, ResolvedOptions } from "./options";
import { decodeAscii, decodeUtf8 } from "./text";
import type {
  Value, ValueKind, CodeFields, DictEntry, DictValue, StrValue,
  TupleValue, ListValue, SetValue, FrozenSetValue,
} from "./value";
import {
  NONE, TRUE, FALSE, STOP_ITERATION, ELLIPSIS,
  int, float, complex, bytes, str, code, addMember, putEntry,
} from "./value";

export interface DecodeResult {
  value: Value;
  /** Bytes consumed by the value. */
  bytesRead: number;
}

type KindOf<K extends ValueKind> = Extract<Value, { kind: K }>;

function isKind<K extends ValueKind>(v: Value, kind: K): v is KindOf<K> {
  return v.kind === kind;
}

/** Attach `offset` to a codec error that has none. */
function locate(err: unknown, offset: number): unknown {
  if (err instanceof MarshalError && err.offset === undefined) {
    return new MarshalError(err.code, err.message, offset);
  }
  return err;
}

// ────────── open containers ──────────

interface SequenceFrame {
  readonly type: "sequence";
  readonly start: number;
  readonly value: TupleValue | ListValue;
  readonly items: Value[];
  readonly count: number;
}

interface SetFrame {
  readonly type: "set";
  readonly start: number;
  /** Live shell of a set. A frozenset is only built once its members are read. */
  readonly value: SetValue | undefined;
  /** Reserved reference slot of a flagged frozenset, or -1. */
  readonly slot: number;
  readonly items: Value[];
  readonly seen: Set<string>;
  readonly count: number;
  read: number;
}

interface DictFrame {
  readonly type: "dict";
  readonly start: number;
  readonly value: DictValue;
  readonly entries: DictEntry[];
  readonly index: Map<string, number>;
  key: Value | undefined;
  keyAt: number;
}

interface CodeFrame {
  readonly type: "code";
  readonly start: number;
  readonly slot: number;
  readonly fields: CodeFields;
  step: number;
}

type Frame = SequenceFrame | SetFrame | DictFrame | CodeFrame;

const CODE_STEPS = 9;
const PLACEHOLDER_BYTES = bytes("");
const PLACEHOLDER_STR = str("");

class Unmarshaller {
  /** `undefined` marks a slot reserved for a code object or frozenset still being read. */
  private readonly refs: (Value | undefined)[] = [];
  private readonly stack: Frame[] = [];

  constructor(
    private readonly r: ByteReader,
    private readonly opts: ResolvedOptions,
  ) {}

  get refCount(): number {
    return this.refs.length;
  }

  /**
   * Read one complete value. Containers are kept on `stack` rather than the
   * call stack, so nesting is bounded by `maxDepth` alone.
   */
  readValue(): Value {
    for (;;) {
      let start = this.r.position;
      let v = this.readObject(this.stack.length + 1);
      if (v === undefined) continue;

      for (;;) {
        const top = this.stack[this.stack.length - 1];
        if (top === undefined) {
          if (v === null) throw new MarshalError(ERR_UNEXPECTED_NULL, "unexpected null marker", start);
          return v;
        }
        if (!this.accept(top, v, start)) break;
        this.stack.pop();
        v = this.finish(top);
        start = top.start;
      }
    }
  }

  /**
   * `null` is the null marker, which only terminates dicts. `undefined` means
   * a container was opened and its items follow.
   */
  private readObject(depth: number): Value | null | undefined {
    const start = this.r.position;
    const tag = this.r.readU8();
    if (depth > this.opts.maxDepth) {
      throw new MarshalError(ERR_RECURSION, `nesting deeper than ${this.opts.maxDepth}`, start);
    }
    const flag = (tag & FLAG_REF) !== 0;
    const type = tag & ~FLAG_REF;
    if (!isTypeCode(type)) {
      throw new MarshalError(ERR_UNKNOWN_TAG, `unknown type code 0x${type.toString(16)}`, start);
    }
    const need = minVersionOf(type);
    if (this.opts.version < need) {
      throw new MarshalError(
        ERR_UNSUPPORTED,
        `type '${String.fromCharCode(type)}' needs version ${need}, decoding version ${this.opts.version}`,
        start,
      );
    }
    if (flag && this.opts.version < REF_FLAG_MIN_VERSION) {
      throw new MarshalError(ERR_UNSUPPORTED, `reference flag needs version ${REF_FLAG_MIN_VERSION}`, start);
    }

    switch (type) {
      case TYPE_NULL: return null;
      case TYPE_NONE: return NONE;
      case TYPE_FALSE: return FALSE;
      case TYPE_TRUE: return TRUE;
      case TYPE_STOPITER: return STOP_ITERATION;
      case TYPE_ELLIPSIS: return ELLIPSIS;

      case TYPE_INT:
        return this.register(int(BigInt(this.r.readI32LE())), flag);
      case TYPE_INT64:
        this.opts.logger.warn(`legacy 64-bit int tag at byte ${start}`);
        return this.register(int(this.r.readI64LE()), flag);
      case TYPE_LONG:
        return this.register(int(readLong(this.r)), flag);

      case TYPE_FLOAT:
        return this.register(float(readFloatText(this.r)), flag);
      case TYPE_BINARY_FLOAT:
        return this.register(float(readFloatBinary(this.r)), flag);
      case TYPE_COMPLEX: {
        const real = readFloatText(this.r);
        const imag = readFloatText(this.r);
        return this.register(complex(real, imag), flag);
      }
      case TYPE_BINARY_COMPLEX: {
        const real = readFloatBinary(this.r);
        const imag = readFloatBinary(this.r);
        return this.register(complex(real, imag), flag);
      }

      case TYPE_STRING:
        return this.register(bytes(this.r.readExact(this.readLength())), flag);
      case TYPE_UNICODE:
      case TYPE_INTERNED: {
        const n = this.readLength();
        const payloadAt = this.r.position;
        const text = decodeUtf8(this.r.readExact(n), payloadAt);
        return this.registerStr(str(text, type === TYPE_INTERNED), flag);
      }
      case TYPE_ASCII:
      case TYPE_ASCII_INTERNED: {
        const n = this.readLength();
        const payloadAt = this.r.position;
        const text = decodeAscii(this.r.readExact(n), payloadAt);
        return this.registerStr(str(text, type === TYPE_ASCII_INTERNED), flag);
      }
      case TYPE_SHORT_ASCII:
      case TYPE_SHORT_ASCII_INTERNED: {
        const n = this.r.readU8();
        const payloadAt = this.r.position;
        const text = decodeAscii(this.r.readExact(n), payloadAt);
        return this.registerStr(str(text, type === TYPE_SHORT_ASCII_INTERNED), flag);
      }

      case TYPE_TUPLE:
      case TYPE_SMALL_TUPLE:
      case TYPE_LIST: {
        const count = type === TYPE_SMALL_TUPLE ? this.r.readU8() : this.readLength();
        this.checkCount(count);
        const items: Value[] = [];
        const value = this.register<TupleValue | ListValue>(
          type === TYPE_LIST ? { kind: "list", items } : { kind: "tuple", items },
          flag,
        );
        return this.open({ type: "sequence", start, value, items, count }, count === 0);
      }
      case TYPE_SET:
      case TYPE_FROZENSET: {
        const count = this.readLength();
        this.checkCount(count);
        const items: Value[] = [];
        // A set may contain a reference to itself; a frozenset may not.
        const frozen = type === TYPE_FROZENSET;
        const value = frozen ? undefined : this.register<SetValue>({ kind: "set", items }, flag);
        const slot = frozen ? this.reserve(flag) : -1;
        return this.open({
          type: "set", start, value, slot,
          items, seen: new Set(), count, read: 0,
        }, count === 0);
      }
      case TYPE_DICT: {
        const entries: DictEntry[] = [];
        const value = this.register<DictValue>({ kind: "dict", entries }, flag);
        return this.open({ type: "dict", start, value, entries, index: new Map(), key: undefined, keyAt: 0 }, false);
      }
      case TYPE_CODE:
        return this.openCode(start, flag);

      case TYPE_REF:
        return this.readRef();
      case TYPE_UNKNOWN:
        throw new MarshalError(ERR_UNKNOWN_TAG, "reserved type code '?'", start);
    }
  }

  // ────────── container stack ──────────

  /** Push `frame`, or finish it at once when no items follow. */
  private open(frame: Frame, empty: boolean): Value | undefined {
    if (empty) return this.finish(frame);
    this.stack.push(frame);
    return undefined;
  }

  /** Hand a child read at `at` to `f`. Returns true once `f` is complete. */
  private accept(f: Frame, v: Value | null, at: number): boolean {
    if (v === null) {
      if (f.type === "dict") return true;
      throw new MarshalError(ERR_UNEXPECTED_NULL, "unexpected null marker", at);
    }
    switch (f.type) {
      case "sequence":
        f.items.push(v);
        return f.items.length === f.count;
      case "set":
        try {
          addMember(f.items, f.seen, v);
        } catch (err) {
          throw locate(err, at);
        }
        return ++f.read === f.count;
      case "dict":
        if (f.key === undefined) {
          f.key = v;
          f.keyAt = at;
          return false;
        }
        this.putDictEntry(f, f.key, v);
        f.key = undefined;
        return false;
      case "code":
        return this.acceptCodeField(f, v, at);
    }
  }

  private finish(f: Frame): Value {
    switch (f.type) {
      case "sequence":
        Object.freeze(f.items);
        return Object.freeze(f.value);
      case "set": {
        Object.freeze(f.items);
        if (f.value !== undefined) return Object.freeze(f.value);
        const v: FrozenSetValue = { kind: "frozenset", items: f.items };
        return this.fill(f.slot, Object.freeze(v));
      }
      case "dict":
        Object.freeze(f.entries);
        return Object.freeze(f.value);
      case "code": {
        try {
          return this.fill(f.slot, code(f.fields));
        } catch (err) {
          throw locate(err, f.start);
        }
      }
    }
  }

  private putDictEntry(f: DictFrame, key: Value, value: Value): void {
    let replaced: boolean;
    try {
      replaced = putEntry(f.entries, f.index, key, value);
    } catch (err) {
      throw locate(err, f.keyAt);
    }
    if (replaced) this.opts.logger.warn(`duplicate dict key at byte ${f.keyAt}, later value wins`);
  }

  /** Read the fixed header; the object-valued fields arrive through `accept`. */
  private openCode(start: number, flag: boolean): undefined {
    const slot = this.reserve(flag);
    const argcount = this.r.readI32LE();
    const posonlyargcount = this.opts.hasPosOnlyArgCount ? this.r.readI32LE() : 0;
    const kwonlyargcount = this.r.readI32LE();
    const nlocals = this.r.readI32LE();
    const stacksize = this.r.readI32LE();
    const flags = this.r.readU32LE();
    this.stack.push({
      type: "code",
      start,
      slot,
      fields: {
        argcount, posonlyargcount, kwonlyargcount, nlocals, stacksize, flags,
        code: PLACEHOLDER_BYTES, filename: PLACEHOLDER_STR, name: PLACEHOLDER_STR,
      },
      step: 0,
    });
    return undefined;
  }

  private acceptCodeField(f: CodeFrame, v: Value, at: number): boolean {
    const d = f.fields;
    switch (f.step++) {
      case 0: d.code = this.field(v, "bytes", "code", at); break;
      case 1: d.consts = this.field(v, "tuple", "consts", at); break;
      case 2: d.names = this.field(v, "tuple", "names", at); break;
      case 3: d.varnames = this.field(v, "tuple", "varnames", at); break;
      case 4: d.freevars = this.field(v, "tuple", "freevars", at); break;
      case 5: d.cellvars = this.field(v, "tuple", "cellvars", at); break;
      case 6: d.filename = this.field(v, "str", "filename", at); break;
      case 7:
        d.name = this.field(v, "str", "name", at);
        d.firstlineno = this.r.readI32LE();
        break;
      default: d.lnotab = this.field(v, "bytes", "lnotab", at);
    }
    return f.step === CODE_STEPS;
  }

  private field<K extends ValueKind>(v: Value, kind: K, name: string, at: number): KindOf<K> {
    if (!isKind(v, kind)) {
      throw new MarshalError(ERR_TYPE, `code field ${name} must be ${kind}, got ${v.kind}`, at);
    }
    return v;
  }

  // ────────── reference table ──────────

  private register<T extends Value>(v: T, flag: boolean): T {
    if (flag) this.refs.push(v);
    return v;
  }

  /** Interned strings are registered whether or not the flag is set. */
  private registerStr(v: StrValue, flag: boolean): StrValue {
    return this.register(v, flag || v.interned);
  }

  /** Hold a slot for a value that cannot be referenced until it is complete. */
  private reserve(flag: boolean): number {
    return flag ? this.refs.push(undefined) - 1 : -1;
  }

  private fill<T extends Value>(slot: number, v: T): T {
    if (slot >= 0) this.refs[slot] = v;
    return v;
  }

  private readRef(): Value {
    const start = this.r.position;
    const idx = this.r.readI32LE();
    if (idx < 0 || idx >= this.refs.length) {
      throw new MarshalError(ERR_BAD_REF, `reference ${idx} outside table of ${this.refs.length}`, start);
    }
    const v = this.refs[idx];
    if (v === undefined) {
      throw new MarshalError(ERR_BAD_REF, `reference ${idx} to an object still being decoded`, start);
    }
    return v;
  }

  // ────────── lengths ──────────

  private readLength(): number {
    const start = this.r.position;
    const n = this.r.readI32LE();
    if (n < 0) throw new MarshalError(ERR_INVALID_LENGTH, `negative length ${n}`, start);
    return n;
  }

  /** Every element takes at least one byte, so a count above the remaining input is truncation. */
  private checkCount(n: number): void {
    if (n > this.r.remaining) {
      throw new MarshalError(ERR_EOF, `container of ${n} items exceeds input`, this.r.position);
    }
  }
}

// ────────── public decode API ──────────

/** Decode one value from the front of `bytes`; trailing bytes are left alone. */
export function decodePrefix(bytes: Uint8Array, opts?: number | DecodeOptions): DecodeResult {
  const o = resolveOptions(opts);
  const r = new ByteReader(bytes);
  const u = new Unmarshaller(r, o);
  const value = u.readValue();
  o.logger.debug(`decoded ${value.kind} from ${r.position} bytes (version ${o.version}, ${u.refCount} refs)`);
  return { value, bytesRead: r.position };
}

/** Decode a blob holding exactly one value. */
export function decode(bytes: Uint8Array, opts?: number | DecodeOptions): Value {
  const { value, bytesRead } = decodePrefix(bytes, opts);
  if (bytesRead !== bytes.length) {
    throw new MarshalError(ERR_TRAILING, `${bytes.length - bytesRead} trailing bytes`, bytesRead);
  }
  return value;
}
