const LOG_NAMESPACE = "[drag-puzzle]";

type TraceHost = typeof globalThis & {
  __PUZZLE_TRACE?: boolean;
};

let tracingEnabled = false;

export function setTracing(enabled: boolean): void {
  tracingEnabled = enabled;
}

export function isTracingEnabled(): boolean {
  return tracingEnabled || (globalThis as TraceHost).__PUZZLE_TRACE === true;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Console logger tagged with `[drag-puzzle][scope]`. Debug and info lines are
 * dropped unless tracing is on; warnings and errors always go through.
 */
export function createLogger(scope: string): Logger {
  const prefix = `${LOG_NAMESPACE}[${scope}]`;
  const emit = (
    level: "debug" | "info" | "warn" | "error",
    message: string,
    data?: Record<string, unknown>
  ) => {
    if ((level === "debug" || level === "info") && !isTracingEnabled()) return;
    if (data) {
      // eslint-disable-next-line no-console
      console[level](`${prefix} ${message}`, data);
    } else {
      // eslint-disable-next-line no-console
      console[level](`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}
