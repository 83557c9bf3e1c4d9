// Marshal error codes and MarshalError class

export const ERR_EOF             = "ERR_EOF";
export const ERR_UNKNOWN_TAG     = "ERR_UNKNOWN_TAG";
export const ERR_BAD_REF         = "ERR_BAD_REF";
export const ERR_RECURSION       = "ERR_RECURSION";
export const ERR_INVALID_LENGTH  = "ERR_INVALID_LENGTH";
export const ERR_INVALID_TEXT    = "ERR_INVALID_TEXT";
export const ERR_UNSUPPORTED     = "ERR_UNSUPPORTED";
export const ERR_INVALID_LONG    = "ERR_INVALID_LONG";
export const ERR_INVALID_FLOAT   = "ERR_INVALID_FLOAT";
export const ERR_UNEXPECTED_NULL = "ERR_UNEXPECTED_NULL";
export const ERR_UNHASHABLE      = "ERR_UNHASHABLE";
export const ERR_TYPE            = "ERR_TYPE";
export const ERR_UNMARSHALLABLE  = "ERR_UNMARSHALLABLE";
export const ERR_TRAILING        = "ERR_TRAILING";
export const ERR_VERSION         = "ERR_VERSION";

export type MarshalErrorCode =
  | typeof ERR_EOF
  | typeof ERR_UNKNOWN_TAG
  | typeof ERR_BAD_REF
  | typeof ERR_RECURSION
  | typeof ERR_INVALID_LENGTH
  | typeof ERR_INVALID_TEXT
  | typeof ERR_UNSUPPORTED
  | typeof ERR_INVALID_LONG
  | typeof ERR_INVALID_FLOAT
  | typeof ERR_UNEXPECTED_NULL
  | typeof ERR_UNHASHABLE
  | typeof ERR_TYPE
  | typeof ERR_UNMARSHALLABLE
  | typeof ERR_TRAILING
  | typeof ERR_VERSION;

export class MarshalError extends Error {
  readonly code: MarshalErrorCode;
  /** Input offset at which decoding failed, when known. */
  readonly offset?: number;
  constructor(code: MarshalErrorCode, msg?: string, offset?: number) {
    super(offset === undefined ? msg || code : `${msg || code} (at byte ${offset})`);
    this.code = code;
    this.offset = offset;
    this.name = "MarshalError";
  }
}
