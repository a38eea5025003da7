/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export const LogLevel = {
  error: 0,
  warn : 1,
  debug: 2,
  trace: 3,
} as const satisfies Record<string, Verbosity>;

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
): Logger {
  return {
    level,
    log(lvl, msg) {
      if (lvl <= this.level) sink(`${lvl}| ${msg}`);
    },
  };
}

export function isVerbosity(n: number): n is Verbosity {
  return Number.isInteger(n) && n >= 0 && n <= 4;
}
