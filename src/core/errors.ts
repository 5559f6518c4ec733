export class PathwayError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PathwayError";
    this.code = code;
  }
}

export class InvalidPatternError extends PathwayError {
  readonly pattern: string;

  constructor(code: string, pattern: string, message: string) {
    super(code, message);
    this.name = "InvalidPatternError";
    this.pattern = pattern;
  }
}

export class MalformedInputError extends PathwayError {
  readonly line: number;
  readonly column: number;

  constructor(code: string, message: string, line: number, column: number) {
    super(code, message);
    this.name = "MalformedInputError";
    this.line = line;
    this.column = column;
  }
}

export type HandlerPhase = "open" | "close";

export class HandlerError extends PathwayError {
  readonly path: string;
  readonly elementName: string;
  readonly pattern: string;
  readonly phase: HandlerPhase;

  constructor(
    details: { path: string; elementName: string; pattern: string; phase: HandlerPhase },
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      "HANDLER_FAILED",
      `${details.phase} handler for "${details.pattern}" failed at ${details.path}: ${reason}`,
      { cause }
    );
    this.name = "HandlerError";
    this.path = details.path;
    this.elementName = details.elementName;
    this.pattern = details.pattern;
    this.phase = details.phase;
  }
}
