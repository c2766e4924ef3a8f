/**
 * Typed error classes for jsonscope operations
 */

export class JsonScopeError extends Error {
  public override readonly name: string = 'JsonScopeError';

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
  }
}

/**
 * Malformed JSON. `line` and `column` are 1-based; `position` is the
 * 0-based offset of the failure.
 */
export class ParseError extends JsonScopeError {
  public override readonly name: string = 'ParseError';

  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number,
    public readonly position: number,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }

  /** Message with position, as shown to the user */
  describe(): string {
    return `${this.message} (line ${this.line}, column ${this.column})`;
  }
}

export type IOOperation = 'read' | 'write' | 'copy';

export class IOError extends JsonScopeError {
  public override readonly name: string = 'IOError';

  constructor(
    message: string,
    public readonly operation: IOOperation,
    public readonly path?: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export class ValidationError extends JsonScopeError {
  public override readonly name: string = 'ValidationError';

  constructor(
    message: string,
    public readonly field?: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
