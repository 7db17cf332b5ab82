export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

// stdout is reserved for the JSON emitted by commands and scripts.
export const consoleLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.warn(message),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};
