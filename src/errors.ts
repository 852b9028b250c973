export class QueryError extends Error {
  override readonly name: string = "QueryError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed query construction, combination argument or container input. */
export class InvalidArgumentError extends QueryError {
  override readonly name = "InvalidArgumentError";
}

export class ColumnNotFoundError extends QueryError {
  override readonly name = "ColumnNotFoundError";

  constructor(readonly column: string, message?: string) {
    super(message ?? `Column '${column}' not found`);
  }
}

export class UnsupportedTableTypeError extends QueryError {
  override readonly name = "UnsupportedTableTypeError";

  constructor(readonly received: string) {
    super(`Unsupported table type: ${received}`);
  }
}

/** A string expression failed to parse or evaluate. The engine's error is kept as `cause`. */
export class ExpressionError extends QueryError {
  override readonly name = "ExpressionError";

  constructor(
    readonly expression: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot evaluate expression "${expression}": ${reason}`, { cause });
  }
}

export class InvalidResultTypeError extends QueryError {
  override readonly name = "InvalidResultTypeError";

  constructor(
    readonly source: string,
    readonly received: string,
  ) {
    super(`${source} must produce a boolean mask, got ${received}`);
  }
}

export class ResultLengthMismatchError extends QueryError {
  override readonly name = "ResultLengthMismatchError";

  constructor(
    readonly source: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`${source} produced ${actual} values for a table of ${expected} rows`);
  }
}

/** Short description of a runtime value for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === "object") {
    const ctor = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof value;
}
