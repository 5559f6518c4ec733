export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  setContext(context: string | undefined): void;
  debug(message: string, ...attributes: unknown[]): void;
  info(message: string, ...attributes: unknown[]): void;
  warn(message: string, ...attributes: unknown[]): void;
  error(message: string, ...attributes: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Writes every level through `console.error`, prefixed with the level and the current context.
 * stdout is left to the CLI's line-oriented results.
 */
export class ConsoleLogger implements Logger {
  private context: string | undefined;
  private readonly minLevel: number;

  constructor(level: LogLevel = "info") {
    this.context = undefined;
    this.minLevel = LEVEL_ORDER[level];
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.write("debug", message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.write("info", message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.write("warn", message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.write("error", message, attributes);
  }

  private write(level: LogLevel, message: string, attributes: unknown[]): void {
    if (LEVEL_ORDER[level] < this.minLevel) {
      return;
    }
    const tag = `[${level}]`;
    if (this.context) console.error(tag, this.context, message, ...attributes);
    else console.error(tag, message, ...attributes);
  }
}

export const silentLogger: Logger = {
  setContext: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
