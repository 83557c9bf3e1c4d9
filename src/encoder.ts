// Marshal encoder: the mirror writer, sharing repeated objects through the reference table

import {
  FLAG_REF, REF_FLAG_MIN_VERSION, MAX_LENGTH, MAX_SHORT_LENGTH,
  TYPE_NULL, TYPE_NONE, TYPE_FALSE, TYPE_TRUE, TYPE_STOPITER, TYPE_ELLIPSIS,
  TYPE_INT, TYPE_FLOAT, TYPE_BINARY_FLOAT, TYPE_COMPLEX, TYPE_BINARY_COMPLEX,
  TYPE_LONG, TYPE_STRING, TYPE_INTERNED, TYPE_REF, TYPE_TUPLE, TYPE_LIST, TYPE_DICT,
  TYPE_CODE, TYPE_UNICODE, TYPE_SET, TYPE_FROZENSET, TYPE_ASCII, TYPE_ASCII_INTERNED,
  TYPE_SMALL_TUPLE, TYPE_SHORT_ASCII, TYPE_SHORT_ASCII_INTERNED,
} from "./constants";
import { ByteWriter } from "./cursor";
import {
  MarshalError,
  ERR_INVALID_LENGTH, ERR_RECURSION, ERR_UNMARSHALLABLE, ERR_UNSUPPORTED,
} from "./errors";
import { writeFloatBinary, writeFloatText } from "./float";
import { writeLong } from "./long";
import { resolveOptions } from "./options";
import type { EncodeOptions, ResolvedOptions } from "./options";
import { encodeUtf8, isAscii } from "./text";
import { isSingleton } from "./value";
import type { Value, CodeValue, StrValue } from "./value";

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;

function children(v: Value): readonly Value[] {
  switch (v.kind) {
    case "tuple":
    case "list":
    case "set":
    case "frozenset":
      return v.items;
    case "dict":
      return v.entries.flat();
    case "code":
      return [v.code, v.consts, v.names, v.varnames, v.freevars, v.cellvars, v.filename, v.name, v.lnotab];
    default:
      return [];
  }
}

/**
 * Values reachable more than once from `root`, by identity. Walks with an
 * explicit stack and does not descend into a value twice, so cycles end.
 */
export function findShared(root: Value): Set<Value> {
  const seen = new Set<Value>();
  const shared = new Set<Value>();
  const stack: Value[] = [root];
  for (let v = stack.pop(); v !== undefined; v = stack.pop()) {
    if (isSingleton(v)) continue;
    if (seen.has(v)) {
      shared.add(v);
      continue;
    }
    seen.add(v);
    const kids = children(v);
    for (let i = kids.length - 1; i >= 0; i--) stack.push(kids[i]);
  }
  return shared;
}

class Marshaller {
  private readonly w = new ByteWriter();
  private readonly refs = new Map<Value, number>();
  private readonly useRefs: boolean;

  constructor(
    private readonly opts: ResolvedOptions,
    private readonly shared: ReadonlySet<Value>,
  ) {
    this.useRefs = opts.version >= REF_FLAG_MIN_VERSION;
  }

  get refCount(): number {
    return this.refs.size;
  }

  finish(): Buffer {
    return this.w.finish();
  }

  writeValue(v: Value, depth: number): void {
    if (depth > this.opts.maxDepth) {
      throw new MarshalError(ERR_RECURSION, `object nested deeper than ${this.opts.maxDepth}`);
    }

    switch (v.kind) {
      case "none": this.w.writeU8(TYPE_NONE); return;
      case "bool": this.w.writeU8(v.value ? TYPE_TRUE : TYPE_FALSE); return;
      case "stopIteration": this.w.writeU8(TYPE_STOPITER); return;
      case "ellipsis": this.w.writeU8(TYPE_ELLIPSIS); return;
      case "unknown": throw new MarshalError(ERR_UNMARSHALLABLE, "the unknown marker cannot be encoded");
      default: break;
    }

    const slot = this.refs.get(v);
    if (slot !== undefined) {
      this.w.writeU8(TYPE_REF);
      this.w.writeI32LE(slot);
      return;
    }
    const flag = this.useRefs && (this.shared.has(v) || (v.kind === "str" && v.interned));
    if (flag) this.refs.set(v, this.refs.size);
    const tag = (type: number): void => this.w.writeU8(flag ? type | FLAG_REF : type);

    switch (v.kind) {
      case "int":
        if (v.value >= INT32_MIN && v.value <= INT32_MAX) {
          tag(TYPE_INT);
          this.w.writeI32LE(Number(v.value));
        } else {
          tag(TYPE_LONG);
          writeLong(this.w, v.value);
        }
        return;
      case "float":
        if (this.opts.version > 1) {
          tag(TYPE_BINARY_FLOAT);
          writeFloatBinary(this.w, v.value);
        } else {
          tag(TYPE_FLOAT);
          writeFloatText(this.w, v.value);
        }
        return;
      case "complex":
        if (this.opts.version > 1) {
          tag(TYPE_BINARY_COMPLEX);
          writeFloatBinary(this.w, v.real);
          writeFloatBinary(this.w, v.imag);
        } else {
          tag(TYPE_COMPLEX);
          writeFloatText(this.w, v.real);
          writeFloatText(this.w, v.imag);
        }
        return;
      case "bytes":
        tag(TYPE_STRING);
        this.writeSized(v.value);
        return;
      case "str":
        this.writeStr(v, tag);
        return;
      case "tuple":
        if (this.opts.version >= 4 && v.items.length <= MAX_SHORT_LENGTH) {
          tag(TYPE_SMALL_TUPLE);
          this.w.writeU8(v.items.length);
        } else {
          tag(TYPE_TUPLE);
          this.writeLength(v.items.length);
        }
        this.writeItems(v.items, depth);
        return;
      case "list":
        tag(TYPE_LIST);
        this.writeLength(v.items.length);
        this.writeItems(v.items, depth);
        return;
      case "set":
        tag(TYPE_SET);
        this.writeLength(v.items.length);
        this.writeItems(v.items, depth);
        return;
      case "frozenset":
        tag(TYPE_FROZENSET);
        this.writeLength(v.items.length);
        this.writeItems(v.items, depth);
        return;
      case "dict":
        tag(TYPE_DICT);
        for (const [k, val] of v.entries) {
          this.writeValue(k, depth + 1);
          this.writeValue(val, depth + 1);
        }
        this.w.writeU8(TYPE_NULL);
        return;
      case "code":
        tag(TYPE_CODE);
        this.writeCode(v, depth);
        return;
    }
  }

  private writeLength(n: number): void {
    if (n > MAX_LENGTH) throw new MarshalError(ERR_INVALID_LENGTH, `length ${n} does not fit 31 bits`);
    this.w.writeI32LE(n);
  }

  private writeSized(data: Uint8Array): void {
    this.writeLength(data.length);
    this.w.writeBytes(data);
  }

  private writeItems(items: readonly Value[], depth: number): void {
    for (const it of items) this.writeValue(it, depth + 1);
  }

  private writeStr(v: StrValue, tag: (type: number) => void): void {
    if (this.opts.version >= 4 && isAscii(v.value)) {
      const data = Buffer.from(v.value, "latin1");
      if (data.length <= MAX_SHORT_LENGTH) {
        tag(v.interned ? TYPE_SHORT_ASCII_INTERNED : TYPE_SHORT_ASCII);
        this.w.writeU8(data.length);
        this.w.writeBytes(data);
      } else {
        tag(v.interned ? TYPE_ASCII_INTERNED : TYPE_ASCII);
        this.writeSized(data);
      }
      return;
    }
    const data = encodeUtf8(v.value);
    tag(v.interned && this.opts.version >= 1 ? TYPE_INTERNED : TYPE_UNICODE);
    this.writeSized(data);
  }

  private writeCode(v: CodeValue, depth: number): void {
    this.w.writeI32LE(v.argcount);
    if (this.opts.hasPosOnlyArgCount) {
      this.w.writeI32LE(v.posonlyargcount);
    } else if (v.posonlyargcount !== 0) {
      throw new MarshalError(ERR_UNSUPPORTED, "posonlyargcount needs a code layout that carries it");
    }
    this.w.writeI32LE(v.kwonlyargcount);
    this.w.writeI32LE(v.nlocals);
    this.w.writeI32LE(v.stacksize);
    this.w.writeU32LE(v.flags);
    this.writeValue(v.code, depth + 1);
    this.writeValue(v.consts, depth + 1);
    this.writeValue(v.names, depth + 1);
    this.writeValue(v.varnames, depth + 1);
    this.writeValue(v.freevars, depth + 1);
    this.writeValue(v.cellvars, depth + 1);
    this.writeValue(v.filename, depth + 1);
    this.writeValue(v.name, depth + 1);
    this.w.writeI32LE(v.firstlineno);
    this.writeValue(v.lnotab, depth + 1);
  }
}

// ────────── public encode API ──────────

/** Serialize `value` under the configured format version. */
export function encode(value: Value, opts?: number | EncodeOptions): Buffer {
  const o = resolveOptions(opts);
  const shared = o.version >= REF_FLAG_MIN_VERSION ? findShared(value) : new Set<Value>();
  const m = new Marshaller(o, shared);
  m.writeValue(value, 1);
  const out = m.finish();
  o.logger.debug(`encoded ${value.kind} into ${out.length} bytes (version ${o.version}, ${m.refCount} refs)`);
  return out;
}
