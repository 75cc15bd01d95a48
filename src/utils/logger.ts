/**
 * Scoped stderr logger. Stdout stays free for CLI output and the MCP stdio protocol.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

function errorDetail(error: unknown): string {
  if (error === undefined) return '';
  return `: ${error instanceof Error ? error.message : String(error)}`;
}

export function createLogger(scope: string): Logger {
  return {
    debug(message) {
      if (debugEnabled) {
        console.error(`[DEBUG] [${scope}] ${message}`);
      }
    },
    info(message) {
      console.error(`[${scope}] ${message}`);
    },
    warn(message, error) {
      console.error(`[${scope}] ⚠️ ${message}${errorDetail(error)}`);
    },
    error(message, error) {
      console.error(`[${scope}] ✗ ${message}${errorDetail(error)}`);
    },
  };
}
