/** Indy error types. Anything the interpreter reports as fatal is one of these. */
export class IndyError extends Error {
  constructor(
    public errorType: string,
    message: string,
    public line?: number,
  ) {
    super(`${errorType}: ${message}`);
    this.name = 'IndyError';
  }
}

/**
 * Structural or argument error found while building the block tree.
 * Always raised before anything executes.
 */
export class ParseError extends IndyError {
  constructor(
    message: string,
    line: number,
    /** Terminator the parser was waiting for, when one applies. */
    public expected?: string,
    public found?: string,
  ) {
    super('ParseError', message, line);
    this.name = 'ParseError';
  }
}
