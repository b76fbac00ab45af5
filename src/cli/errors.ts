/**
 * Error taxonomy for hookstamp
 *
 * Every failure raised while fingerprinting, building, writing or loading a
 * manifest is fatal to the build pass that raised it. Command actions catch
 * these, log them with `formatError` and exit 1.
 */

/**
 * Base class for all hookstamp errors
 */
export class HookstampError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a fingerprint is requested over zero files
 */
export class EmptyInputError extends HookstampError {
  constructor() {
    super("No files specified for fingerprint computation");
  }
}

/**
 * Raised when a fingerprint input is absent, not a regular file, or unreadable
 */
export class MissingFileError extends HookstampError {
  readonly path: string;

  constructor(args: { path: string; reason?: string | null }) {
    const { path, reason } = args;
    super(`File not found or unreadable: ${path}${reason ? ` (${reason})` : ""}`);
    this.path = path;
  }
}

/**
 * Raised when a single builder argument breaks the manifest schema
 */
export class SchemaViolationError extends HookstampError {
  readonly field: string;

  constructor(args: { field: string; message: string }) {
    const { field, message } = args;
    super(`Invalid ${field}: ${message}`);
    this.field = field;
  }
}

/**
 * Raised when a manifest fails validation; carries every violation found
 */
export class ValidationErrors extends HookstampError {
  readonly violations: ReadonlyArray<string>;

  constructor(args: { violations: ReadonlyArray<string> }) {
    const { violations } = args;
    super(`Manifest failed schema validation (${violations.length} violation(s))`);
    this.violations = violations;
  }
}

export type WriteErrorKind =
  | "directory-create-failed"
  | "write-failed"
  | "rename-failed";

/**
 * Raised when the manifest cannot be persisted
 */
export class WriteError extends HookstampError {
  readonly kind: WriteErrorKind;
  readonly path: string;

  constructor(args: { kind: WriteErrorKind; path: string; cause: unknown }) {
    const { kind, path, cause } = args;
    super(`${describeWriteKind(kind)}: ${path} (${describeCause(cause)})`);
    this.kind = kind;
    this.path = path;
  }
}

/**
 * Raised when an existing manifest cannot be parsed or is not valid
 */
export class ManifestReadError extends HookstampError {
  readonly path: string;
  readonly violations: ReadonlyArray<string>;

  constructor(args: {
    path: string;
    message: string;
    violations?: ReadonlyArray<string> | null;
  }) {
    const { path, message, violations } = args;
    super(`${message}: ${path}`);
    this.path = path;
    this.violations = violations ?? [];
  }
}

/**
 * Raised when hookstamp.config.json is unreadable or invalid
 */
export class ConfigError extends HookstampError {
  readonly path: string;
  readonly violations: ReadonlyArray<string>;

  constructor(args: {
    path: string;
    message: string;
    violations?: ReadonlyArray<string> | null;
  }) {
    const { path, message, violations } = args;
    super(`${message}: ${path}`);
    this.path = path;
    this.violations = violations ?? [];
  }
}

const describeWriteKind = (kind: WriteErrorKind): string => {
  switch (kind) {
    case "directory-create-failed":
      return "Failed to create directory";
    case "write-failed":
      return "Failed to write temporary manifest file";
    case "rename-failed":
      return "Failed to move manifest into place";
  }
};

/**
 * Render an unknown thrown value as a short message
 * @param cause - Value caught from a failed operation
 *
 * @returns The error message, or the stringified value
 */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
};

/**
 * Flatten an error into log lines, listing every violation it carries
 * @param err - The caught value
 *
 * @returns Lines to log, headline first
 */
export const formatError = (err: unknown): Array<string> => {
  if (
    err instanceof ValidationErrors ||
    err instanceof ManifestReadError ||
    err instanceof ConfigError
  ) {
    return [err.message, ...err.violations.map((violation) => `  - ${violation}`)];
  }
  return [describeCause(err)];
};
