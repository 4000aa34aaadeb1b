import { EXIT } from "../core/constants.js";

export type ErrorKind =
  | "invalid-input"
  | "unsupported-kind"
  | "conversion-error"
  | "wrong-arity"
  | "no-properties-specified"
  | "filesystem";

/**
 * Base error class for the record command tree.
 * Every RecordTreeError carries a kind, so callers can branch without
 * instanceof chains, and an exit code, so the CLI can exit with the
 * correct status without catching-and-switching on error types.
 */
export class RecordTreeError extends Error {
  public readonly kind: ErrorKind;
  public readonly exitCode: number;

  constructor(
    message: string,
    kind: ErrorKind,
    exitCode: number = EXIT.VALIDATION_ERROR,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RecordTreeError";
    this.kind = kind;
    this.exitCode = exitCode;
  }
}

/** Top-level value is not a mutable record. */
export class InvalidInputError extends RecordTreeError {
  constructor(message: string) {
    super(message, "invalid-input", EXIT.BAD_INPUT);
    this.name = "InvalidInputError";
  }
}

/** A field's shape has no defined handling. */
export class UnsupportedKindError extends RecordTreeError {
  constructor(kind: string, detail?: string) {
    super(
      detail ? `unsupported kind: ${kind} (${detail})` : `unsupported kind: ${kind}`,
      "unsupported-kind",
    );
    this.name = "UnsupportedKindError";
  }
}

/** Text could not be parsed into the target scalar. */
export class ConversionError extends RecordTreeError {
  constructor(message: string) {
    super(message, "conversion-error", EXIT.BAD_INPUT);
    this.name = "ConversionError";
  }
}

/** A leaf received a different number of positional arguments than it takes. */
export class WrongArityError extends RecordTreeError {
  constructor(expected: number, got: number) {
    super(
      `expected ${expected} argument${expected === 1 ? "" : "s"}, got ${got}`,
      "wrong-arity",
      EXIT.BAD_INPUT,
    );
    this.name = "WrongArityError";
  }
}

/** Flag-based add invoked without any flags. */
export class NoPropertiesError extends RecordTreeError {
  constructor() {
    super("no properties specified", "no-properties-specified", EXIT.BAD_INPUT);
    this.name = "NoPropertiesError";
  }
}

/** Filesystem-level error wrapper. */
export class FilesystemError extends RecordTreeError {
  constructor(message: string) {
    super(message, "filesystem", EXIT.FILESYSTEM_ERROR);
    this.name = "FilesystemError";
  }
}

/**
 * Locates a failure at a field. Nested wraps join into a dotted path,
 * so `Backends` wrapping `Port` reads "Backends.Port: ...".
 * Kind and exit code come from the wrapped error.
 */
export class FieldError extends RecordTreeError {
  public readonly path: string[];
  public readonly reason: RecordTreeError;

  constructor(field: string, cause: RecordTreeError) {
    const inner = cause instanceof FieldError ? cause.reason : cause;
    const path = cause instanceof FieldError ? [field, ...cause.path] : [field];
    super(`${path.join(".")}: ${inner.message}`, inner.kind, inner.exitCode, {
      cause,
    });
    this.name = "FieldError";
    this.path = path;
    this.reason = inner;
  }
}

/**
 * Wrap any thrown value with a field name. Non-tree errors propagate as-is,
 * so programming mistakes are not disguised as record errors.
 */
export function wrapField(field: string, err: unknown): unknown {
  if (err instanceof RecordTreeError) {
    return new FieldError(field, err);
  }
  return err;
}
