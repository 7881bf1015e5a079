/**
 * Options shared by every `docent` command, parsed on the root program.
 */
export interface GlobalOptions {
  verbose: boolean;
  /** Machine-readable output on stdout; human messages are dropped */
  json: boolean;
}

/**
 * What a command handler writes through. Satisfies the library `Logger`,
 * so it can be handed straight to services.
 */
export interface CommandContext {
  options: GlobalOptions;
  /** stdout; silent under --json */
  log: (message: string) => void;
  /** Only with --verbose */
  debug: (message: string) => void;
  warn: (message: string) => void;
  /** stderr; a `{"error": ...}` object under --json */
  error: (message: string) => void;
}

/**
 * Commands resolve their context lazily: global options are only known
 * once commander has parsed argv.
 */
export type ContextFactory = () => CommandContext;
