export type CloneErrorSeverity = "fatal" | "recoverable";

export const API_ERROR_CODES = ["API_ERROR", "API_RESPONSE_INVALID", "NETWORK_ERROR"] as const;

export const REPO_ERROR_CODES = ["CLONE_FAILED", "GIT_SPAWN_FAILED"] as const;

export const CONFIG_ERROR_CODES = ["CONFIG_INVALID"] as const;

export const PERSISTENCE_ERROR_CODES = ["SUMMARY_WRITE_FAILED"] as const;

export const CLONE_ERROR_CODES = [
  ...API_ERROR_CODES,
  ...REPO_ERROR_CODES,
  ...CONFIG_ERROR_CODES,
  ...PERSISTENCE_ERROR_CODES,
] as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[number];
export type RepoErrorCode = (typeof REPO_ERROR_CODES)[number];
export type ConfigErrorCode = (typeof CONFIG_ERROR_CODES)[number];
export type PersistenceErrorCode = (typeof PERSISTENCE_ERROR_CODES)[number];
export type CloneErrorCode = (typeof CLONE_ERROR_CODES)[number];

export interface CloneErrorOptions {
  severity?: CloneErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class CloneError extends Error {
  public readonly code: CloneErrorCode;
  public readonly severity: CloneErrorSeverity;
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  public constructor(
    message: string,
    code: CloneErrorCode,
    severity: CloneErrorSeverity,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "CloneError";
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
  }
}

function createError(
  code: CloneErrorCode,
  message: string,
  defaultSeverity: CloneErrorSeverity,
  options: CloneErrorOptions = {},
): CloneError {
  return new CloneError(
    message,
    code,
    options.severity ?? defaultSeverity,
    options.context,
    options.cause,
  );
}

export function apiError(
  code: ApiErrorCode,
  message: string,
  options: CloneErrorOptions = {},
): CloneError {
  return createError(code, message, "fatal", options);
}

export function configError(
  code: ConfigErrorCode,
  message: string,
  options: CloneErrorOptions = {},
): CloneError {
  return createError(code, message, "fatal", options);
}

export function persistenceError(
  code: PersistenceErrorCode,
  message: string,
  options: CloneErrorOptions = {},
): CloneError {
  return createError(code, message, "fatal", options);
}

/** Errors that abort the run before any repository is touched. */
export function isListingError(error: unknown): error is CloneError {
  return (
    error instanceof CloneError &&
    (API_ERROR_CODES as readonly CloneErrorCode[]).includes(error.code)
  );
}
