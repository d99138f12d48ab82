/**
 * Error taxonomy of the dump engine. All of these are deterministic:
 * re-running with the same input raises the same error.
 */

export class AbiDumpError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbiDumpError';
  }
}

/**
 * Malformed dump text.
 */
export class ParseError extends AbiDumpError {
  /** 1-based line number of the offending line, if known. */
  public readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = 'ParseError';
    this.line = line;
  }
}

/** Two inputs claim the same identity where it must be unique. */
export class ConflictError extends AbiDumpError {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/** The requested rendering would lose information. */
export class RenderError extends AbiDumpError {
  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}

/** Nothing in the target hierarchy to infer an unsupported target's dump from. */
export class InferenceError extends AbiDumpError {
  public readonly target: string;

  constructor(target: string, message: string) {
    super(message);
    this.name = 'InferenceError';
    this.target = target;
  }
}
