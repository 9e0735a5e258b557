export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
}

function debugEnabled(): boolean {
  return process.env.ENGINE_DEBUG?.toLowerCase() === 'true';
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, details) {
      if (!debugEnabled()) {
        return;
      }
      if (details) {
        console.debug(`${prefix} ${message}`, details);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },
    warn(message, details) {
      if (details) {
        console.warn(`${prefix} ${message}`, details);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },
  };
}
