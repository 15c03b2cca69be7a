export class ConfigurationInvalidError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigurationInvalidError";
    this.issues = issues;
  }
}

export class StageSearchFailedError extends Error {
  readonly stage: string;

  constructor(stage: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StageSearchFailedError";
    this.stage = stage;
  }
}

export class CallTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CallAbortedError extends Error {
  constructor(operation: string) {
    super(`${operation} was aborted`);
    this.name = "CallAbortedError";
  }
}

export const mapErrorMessage = (error: unknown): string => {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return "unknown error";
};

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const details: Record<string, unknown> = {
    error_name: error.name,
    error_message: error.message
  };

  if (error.stack) {
    details.error_stack = error.stack;
  }

  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    details.error_cause = {
      name: cause.name,
      message: cause.message,
      stack: cause.stack
    };
  } else if (cause !== undefined) {
    details.error_cause = cause;
  }

  return details;
};
