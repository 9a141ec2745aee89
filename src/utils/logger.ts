/**
 * Console logging on stderr. stdout is reserved for the MCP stdio transport.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(scope: string, debug = false): Logger {
  const prefix = `[${scope}]`;
  const write = (message: string, error?: unknown) => {
    if (error === undefined) {
      console.error(`${prefix} ${message}`);
    } else {
      console.error(`${prefix} ${message}`, error);
    }
  };

  return {
    debug: (message) => {
      if (debug) {
        write(`[DEBUG] ${message}`);
      }
    },
    info: (message) => write(message),
    warn: (message, error) => write(`⚠️ ${message}`, error),
    error: (message, error) => write(`❌ ${message}`, error),
  };
}

/**
 * Structured log line for a failed boundary call
 */
export function createErrorLog(
  timestamp: Date,
  attempt: number,
  modelName: string,
  error: string,
  nextRetryInMs?: number
) {
  return {
    timestamp: timestamp.toISOString(),
    attempt,
    model: modelName,
    error,
    next_retry_in_ms: nextRetryInMs,
    severity: attempt >= 3 ? 'HIGH' : 'MEDIUM',
  };
}
