/**
 * Minimal logging surface. Components log a single tagged summary line
 * per operation, e.g. `[FlightLog] Parsed 1200 frames`.
 */

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
};

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
};
