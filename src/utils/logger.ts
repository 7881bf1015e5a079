/**
 * Logger interface for library code.
 *
 * Engine classes accept a Logger through their options. The CLI passes its
 * CommandContext (which satisfies this interface); tests pass silentLogger
 * or a vi.fn()-backed object.
 */
export interface Logger {
  warn: (message: string) => void;
  /** Optional - only shown by the CLI in --verbose mode */
  debug?: (message: string) => void;
}

export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
