export class BatchTaskError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "BatchTaskError";
  }
}

export class ConfigError extends BatchTaskError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class BatchJobError extends BatchTaskError {
  constructor(
    message: string,
    public readonly problems: string[] = [],
  ) {
    super(message);
    this.name = "BatchJobError";
  }
}

export class InvocationError extends BatchTaskError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InvocationError";
  }
}

export class InvocationTimeoutError extends InvocationError {
  constructor(
    message: string,
    public readonly timeoutSeconds: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "InvocationTimeoutError";
  }
}

export class DockerError extends BatchTaskError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DockerError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  invocation: "INVOCATION_ERROR",
  timeout: "INVOCATION_TIMEOUT",
  docker: "DOCKER_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

// Process statuses for failures raised before the tool reports one of its own.
export const EXIT_CODES = {
  usage: 2,
  timeout: 124,
  notResolvable: 127,
} as const;

export type UserFacingErrorOptions = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode?: number;

  constructor(opts: UserFacingErrorOptions) {
    super(opts.message);
    this.name = "UserFacingError";
    this.code = opts.code;
    this.title = opts.title;
    this.hint = opts.hint;
    this.next = opts.next;
    this.cause = opts.cause;
    this.exitCode = opts.exitCode;
  }
}
