// Logging hook for codec calls

export interface Logger {
  debug(msg: string): void;
  warn(msg: string): void;
}

/** Drops everything. The default. */
export const silentLogger: Logger = {
  debug() {},
  warn() {},
};

export const consoleLogger: Logger = {
  debug(msg) { console.debug(`[marshal] ${msg}`); },
  warn(msg) { console.warn(`[marshal] ${msg}`); },
};
