export interface Logger {
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message, extra = {}) => console.log(`${prefix} ${message}`, extra),
    warn: (message, extra = {}) => console.warn(`${prefix} ${message}`, extra),
    error: (message, extra = {}) => console.error(`${prefix} ${message}`, extra),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
