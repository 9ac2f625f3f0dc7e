/**
 * Log sink: receives human-readable progress lines from the engine and the simulation.
 * Observational only; nothing reads it back to make decisions.
 */

export interface LogSink {
  setStarName(starName: string): void;
  log(message: string): void;
}

/** Discards everything. Used when the caller passes no sink. */
export const EMPTY_LOG_SINK: LogSink = {
  setStarName(): void {},
  log(): void {},
};

/** Sink that keeps every line in memory, in call order. */
export interface BufferedLogSink extends LogSink {
  readonly lines: readonly string[];
  readonly starName: string | null;
}

export function createBufferedLogSink(): BufferedLogSink {
  const lines: string[] = [];
  let starName: string | null = null;
  return {
    get lines() {
      return lines;
    },
    get starName() {
      return starName;
    },
    setStarName(name: string): void {
      starName = name;
    },
    log(message: string): void {
      lines.push(message);
    },
  };
}
