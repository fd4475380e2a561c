export type TraceSink = (line: string) => void;

export const TRACE_PREFIX = '[objectforge]';

export const stderrSink: TraceSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export interface Tracer {
  readonly enabled: boolean;
  /** Message is built only when tracing is on. */
  write(message: () => string): void;
}

export function createTracer(
  enabled: boolean,
  sink: TraceSink = stderrSink
): Tracer {
  return {
    enabled,
    write(message) {
      if (enabled) {
        sink(`${TRACE_PREFIX} ${message()}`);
      }
    },
  };
}
