// marshal-codec: public API

export { MarshalError } from "./errors";
export type { MarshalErrorCode } from "./errors";
export {
  ERR_EOF,
  ERR_UNKNOWN_TAG,
  ERR_BAD_REF,
  ERR_RECURSION,
  ERR_INVALID_LENGTH,
  ERR_INVALID_TEXT,
  ERR_UNSUPPORTED,
  ERR_INVALID_LONG,
  ERR_INVALID_FLOAT,
  ERR_UNEXPECTED_NULL,
  ERR_UNHASHABLE,
  ERR_TYPE,
  ERR_UNMARSHALLABLE,
  ERR_TRAILING,
  ERR_VERSION,
} from "./errors";

export * from "./constants";

export type {
  Value,
  ValueKind,
  SequenceValue,
  NoneValue,
  BoolValue,
  StopIterationValue,
  EllipsisValue,
  UnknownValue,
  IntValue,
  FloatValue,
  ComplexValue,
  BytesValue,
  StrValue,
  TupleValue,
  ListValue,
  SetValue,
  FrozenSetValue,
  DictEntry,
  DictValue,
  CodeValue,
  CodeFields,
} from "./value";
export {
  NONE,
  TRUE,
  FALSE,
  STOP_ITERATION,
  ELLIPSIS,
  UNKNOWN,
  isSingleton,
  bool,
  int,
  float,
  complex,
  bytes,
  str,
  tuple,
  list,
  set,
  frozenset,
  dict,
  code,
  dictGet,
  tupleStrings,
  CodeFlag,
  codeFlagNames,
} from "./value";
export { hashKey, isHashable, valueEquals } from "./keys";

export type { Logger } from "./logger";
export { silentLogger, consoleLogger } from "./logger";
export type { CodecOptions, DecodeOptions, EncodeOptions } from "./options";

export { decode, decodePrefix } from "./decoder";
export type { DecodeResult } from "./decoder";
export { encode } from "./encoder";

export { formatFloat, parseFloatText } from "./float";
export { longToDigits, longFromDigits } from "./long";
export type { LongDigits } from "./long";
