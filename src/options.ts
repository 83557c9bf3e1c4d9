// Per-call configuration, resolved against the format defaults

import { DEFAULT_VERSION, MAX_DEPTH, VERSION_MIN, VERSION_MAX } from "./constants";
import { MarshalError, ERR_VERSION, ERR_TYPE } from "./errors";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";

export interface CodecOptions {
  /** Format version, 0 to 4. */
  version?: number;
  /** Deepest nesting accepted before failing with ERR_RECURSION. */
  maxDepth?: number;
  /** Code objects carry `posonlyargcount` (layout of 3.8 and later). */
  hasPosOnlyArgCount?: boolean;
  logger?: Logger;
}

export type DecodeOptions = CodecOptions;
export type EncodeOptions = CodecOptions;

export interface ResolvedOptions {
  readonly version: number;
  readonly maxDepth: number;
  readonly hasPosOnlyArgCount: boolean;
  readonly logger: Logger;
}

export function resolveOptions(opts?: number | CodecOptions): ResolvedOptions {
  const o: CodecOptions = typeof opts === "number" ? { version: opts } : opts ?? {};
  const version = o.version ?? DEFAULT_VERSION;
  if (!Number.isInteger(version) || version < VERSION_MIN || version > VERSION_MAX) {
    throw new MarshalError(ERR_VERSION, `unsupported format version: ${version}`);
  }
  const maxDepth = o.maxDepth ?? MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new MarshalError(ERR_TYPE, `maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return {
    version,
    maxDepth,
    hasPosOnlyArgCount: o.hasPosOnlyArgCount ?? true,
    logger: o.logger ?? silentLogger,
  };
}
