export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(`[INFO] ${message}`),
  warn: (message) => console.warn(`[WARNING] ${message}`),
  error: (message, error) => {
    if (error === undefined) {
      console.error(`[ERROR] ${message}`);
      return;
    }
    console.error(`[ERROR] ${message}: ${describeError(error)}`);
  }
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {}
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
