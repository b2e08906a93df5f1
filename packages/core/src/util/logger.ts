/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
  /** derive a logger that prefixes its lines with another scope */
  child(scope: string): Logger;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.error,
  scope = 'byteslice',
): Logger {
  return {
    level,
    log(lvl, msg) {
      if (lvl <= level) sink(`${lvl}| ${scope}: ${msg}`);
    },
    child(sub) {
      return createLogger(level, sink, `${scope}:${sub}`);
    },
  };
}

/** Clamp a repeat count (e.g. `-vvv`) into the supported range */
export function toVerbosity(n: number): Verbosity {
  if (n >= 4) return 4;
  if (n === 3) return 3;
  if (n === 2) return 2;
  if (n === 1) return 1;
  return 0;
}
