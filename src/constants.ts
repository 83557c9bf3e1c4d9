// Marshal format constants: type codes, reference flag, versions, limits

/** Type codes (low 7 bits of the tag byte). Values are ASCII characters and frozen by the format. */
export const TYPE_NULL                 = 0x30; // '0'
export const TYPE_NONE                 = 0x4e; // 'N'
export const TYPE_FALSE                = 0x46; // 'F'
export const TYPE_TRUE                 = 0x54; // 'T'
export const TYPE_STOPITER             = 0x53; // 'S'
export const TYPE_ELLIPSIS             = 0x2e; // '.'
export const TYPE_INT                  = 0x69; // 'i'
export const TYPE_INT64                = 0x49; // 'I'
export const TYPE_FLOAT                = 0x66; // 'f'
export const TYPE_BINARY_FLOAT         = 0x67; // 'g'
export const TYPE_COMPLEX              = 0x78; // 'x'
export const TYPE_BINARY_COMPLEX       = 0x79; // 'y'
export const TYPE_LONG                 = 0x6c; // 'l'
export const TYPE_STRING               = 0x73; // 's'
export const TYPE_INTERNED             = 0x74; // 't'
export const TYPE_REF                  = 0x72; // 'r'
export const TYPE_TUPLE                = 0x28; // '('
export const TYPE_LIST                 = 0x5b; // '['
export const TYPE_DICT                 = 0x7b; // '{'
export const TYPE_CODE                 = 0x63; // 'c'
export const TYPE_UNICODE              = 0x75; // 'u'
export const TYPE_UNKNOWN              = 0x3f; // '?'
export const TYPE_SET                  = 0x3c; // '<'
export const TYPE_FROZENSET            = 0x3e; // '>'
export const TYPE_ASCII                = 0x61; // 'a'
export const TYPE_ASCII_INTERNED       = 0x41; // 'A'
export const TYPE_SMALL_TUPLE          = 0x29; // ')'
export const TYPE_SHORT_ASCII          = 0x7a; // 'z'
export const TYPE_SHORT_ASCII_INTERNED = 0x5a; // 'Z'

export type TypeCode =
  | typeof TYPE_NULL | typeof TYPE_NONE | typeof TYPE_FALSE | typeof TYPE_TRUE
  | typeof TYPE_STOPITER | typeof TYPE_ELLIPSIS | typeof TYPE_INT | typeof TYPE_INT64
  | typeof TYPE_FLOAT | typeof TYPE_BINARY_FLOAT | typeof TYPE_COMPLEX
  | typeof TYPE_BINARY_COMPLEX | typeof TYPE_LONG | typeof TYPE_STRING
  | typeof TYPE_INTERNED | typeof TYPE_REF | typeof TYPE_TUPLE | typeof TYPE_LIST
  | typeof TYPE_DICT | typeof TYPE_CODE | typeof TYPE_UNICODE | typeof TYPE_UNKNOWN
  | typeof TYPE_SET | typeof TYPE_FROZENSET | typeof TYPE_ASCII
  | typeof TYPE_ASCII_INTERNED | typeof TYPE_SMALL_TUPLE | typeof TYPE_SHORT_ASCII
  | typeof TYPE_SHORT_ASCII_INTERNED;

/** Bit 7 of the tag byte: the value is registered in the reference table. */
export const FLAG_REF = 0x80;

/** Format versions */
export const VERSION_MIN = 0;
export const VERSION_MAX = 4;
export const DEFAULT_VERSION = VERSION_MAX;

/** First version that defines each tag. Tags missing here exist since version 0. */
const MIN_VERSION: Partial<Record<TypeCode, number>> = {
  [TYPE_INTERNED]: 1,
  [TYPE_BINARY_FLOAT]: 2,
  [TYPE_BINARY_COMPLEX]: 2,
  [TYPE_REF]: 3,
  [TYPE_ASCII]: 4,
  [TYPE_ASCII_INTERNED]: 4,
  [TYPE_SHORT_ASCII]: 4,
  [TYPE_SHORT_ASCII_INTERNED]: 4,
  [TYPE_SMALL_TUPLE]: 4,
};

/** The reference flag bit needs this version. */
export const REF_FLAG_MIN_VERSION = 3;

const TYPE_CODES: ReadonlySet<number> = new Set<number>([
  TYPE_NULL, TYPE_NONE, TYPE_FALSE, TYPE_TRUE, TYPE_STOPITER, TYPE_ELLIPSIS,
  TYPE_INT, TYPE_INT64, TYPE_FLOAT, TYPE_BINARY_FLOAT, TYPE_COMPLEX,
  TYPE_BINARY_COMPLEX, TYPE_LONG, TYPE_STRING, TYPE_INTERNED, TYPE_REF,
  TYPE_TUPLE, TYPE_LIST, TYPE_DICT, TYPE_CODE, TYPE_UNICODE, TYPE_UNKNOWN,
  TYPE_SET, TYPE_FROZENSET, TYPE_ASCII, TYPE_ASCII_INTERNED, TYPE_SMALL_TUPLE,
  TYPE_SHORT_ASCII, TYPE_SHORT_ASCII_INTERNED,
]);

export function isTypeCode(code: number): code is TypeCode {
  return TYPE_CODES.has(code);
}

export function minVersionOf(code: TypeCode): number {
  return MIN_VERSION[code] ?? VERSION_MIN;
}

/** Structural limits */
export const MAX_DEPTH = 2000;
export const MAX_LENGTH = 0x7fff_ffff;
export const MAX_SHORT_LENGTH = 0xff;
