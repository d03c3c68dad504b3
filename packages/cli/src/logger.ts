export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  info: (message) => console.log(`INFO: ${message}`),
  warn: (message) => console.warn(`WARNING: ${message}`),
  error: (message) => console.error(`ERROR: ${message}`),
};
/* eslint-enable no-console */

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
