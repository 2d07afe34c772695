/**
 * Diagnostics go to stderr so stdout carries only the report.
 */

export interface Logger {
  info(message: string): void;
  verbose(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(options: { verbose?: boolean } = {}): Logger {
  return {
    info: (message) => console.error(message),
    verbose: (message) => {
      if (options.verbose) {
        console.error(`[verbose] ${message}`);
      }
    },
    warn: (message) => console.error(`Warning: ${message}`),
    error: (message) => console.error(`Error: ${message}`),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  verbose: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
