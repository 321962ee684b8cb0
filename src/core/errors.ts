// =============================================================================
// BASE ERRORS
// =============================================================================

export class AuditError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "AuditError";
  }
}

export class ConfigError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class ManifestError extends AuditError {
  constructor(
    message: string,
    public readonly source: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ManifestError";
  }
}

// =============================================================================
// CHECK ERRORS
// =============================================================================

/** Identifies the manifest (and container) a failing pass was evaluating. */
export type CheckSubject = {
  kind: string;
  namespace: string;
  name: string;
  containerName?: string;
};

export class CatalogLoadError extends AuditError {
  constructor(
    public readonly checkId: string,
    public readonly source: string,
    cause?: unknown,
  ) {
    super(`Failed to load built-in check ${checkId} from ${source}: ${describeCause(cause)}`, cause);
    this.name = "CatalogLoadError";
  }
}

export class CheckNotFoundError extends AuditError {
  constructor(
    public readonly checkId: string,
    public readonly subject?: CheckSubject,
  ) {
    super(`Check ${checkId} not found${describeSubject(subject)}`);
    this.name = "CheckNotFoundError";
  }
}

export class InvalidCustomCheckError extends AuditError {
  constructor(
    public readonly checkId: string,
    public readonly issues: readonly string[],
    public readonly subject?: CheckSubject,
  ) {
    super(`Custom check ${checkId} is invalid${describeSubject(subject)}: ${issues.join("; ")}`);
    this.name = "InvalidCustomCheckError";
  }
}

export class MalformedCheckError extends AuditError {
  constructor(
    public readonly checkId: string,
    public readonly detail: string,
    public readonly subject?: CheckSubject,
  ) {
    super(`Check ${checkId} could not be evaluated${describeSubject(subject)}: ${detail}`);
    this.name = "MalformedCheckError";
  }
}

export function describeCheckSubject(subject: CheckSubject): string {
  const objectName = subject.namespace ? `${subject.namespace}/${subject.name}` : subject.name;
  const container = subject.containerName ? ` container ${subject.containerName}` : "";
  return `${subject.kind} ${objectName}${container}`;
}

export type PassError = CheckNotFoundError | InvalidCustomCheckError | MalformedCheckError;

export function isPassError(error: unknown): error is PassError {
  return (
    error instanceof CheckNotFoundError ||
    error instanceof InvalidCustomCheckError ||
    error instanceof MalformedCheckError
  );
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  catalog: "CATALOG_ERROR",
  manifest: "MANIFEST_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly cause?: unknown;
  readonly exitCode?: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
    this.exitCode = input.exitCode;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeSubject(subject: CheckSubject | undefined): string {
  return subject ? ` (${describeCheckSubject(subject)})` : "";
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
