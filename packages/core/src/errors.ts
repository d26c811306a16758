/**
 * Document edit error taxonomy.
 *
 * Validation failures are raised before any network call. Remote failures are
 * classified once (see `staleness/guard.ts`) and never retried automatically.
 */

export type DocEditErrorCode =
  | "INVALID_RANGE"
  | "INVALID_OPERATION_KIND"
  | "INVALID_BATCH_FILE"
  | "INVALID_ARGUMENT"
  | "STALE_DOCUMENT"
  | "REMOTE_OPERATION_FAILED"
  | "AUTHENTICATION_FAILED"
  | "SECTION_NOT_FOUND";

type DocEditErrorOptions = {
  context?: Record<string, unknown>;
  hint?: string;
  cause?: unknown;
};

export class DocEditError extends Error {
  override readonly name: string = "DocEditError";
  readonly code: DocEditErrorCode;
  readonly context: Record<string, unknown>;
  /** User-facing remediation, printed after the message by the CLI */
  readonly hint?: string;

  constructor(code: DocEditErrorCode, message: string, options: DocEditErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.code = code;
    this.context = options.context ?? {};
    this.hint = options.hint;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.hint,
      context: this.context,
    };
  }
}

export function isDocEditError(error: unknown): error is DocEditError {
  return error instanceof DocEditError;
}

export function invalidRange(start: number, end: number): DocEditError {
  return new DocEditError(
    "INVALID_RANGE",
    `endIndex (${end}) must be greater than startIndex (${start})`,
    { context: { start, end } }
  );
}

export function invalidPosition(label: string, value: number): DocEditError {
  return new DocEditError(
    "INVALID_RANGE",
    `${label} must be a non-negative integer, got ${value}`,
    { context: { [label]: value } }
  );
}

export function invalidOperationKind(kind: string, index?: number): DocEditError {
  const where = index === undefined ? "" : ` at position ${index}`;
  return new DocEditError("INVALID_OPERATION_KIND", `Unknown operation type${where}: ${kind}`, {
    context: { kind, index },
  });
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wraps anything thrown into a DocEditError, keeping classified errors as they are. */
export function toDocEditError(
  error: unknown,
  fallbackCode: DocEditErrorCode = "REMOTE_OPERATION_FAILED"
): DocEditError {
  if (isDocEditError(error)) {
    return error;
  }
  return new DocEditError(fallbackCode, getErrorMessage(error), { cause: error });
}
