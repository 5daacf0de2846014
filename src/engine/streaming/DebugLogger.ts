export type LogSink = Pick<Console, 'debug' | 'warn'>;

export type DebugLogger = {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  child(scope: string): DebugLogger;
};

export function createDebugLogger(scope: string, enabled: boolean, sink: LogSink = console): DebugLogger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...details) {
      if (!enabled) return;
      sink.debug(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (!enabled) return;
      sink.warn(`${prefix} ${message}`, ...details);
    },
    child(childScope) {
      return createDebugLogger(childScope, enabled, sink);
    }
  };
}
