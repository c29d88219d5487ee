export const ERROR_CODES = Object.freeze({
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  COMPLETION_FAILED: 'COMPLETION_FAILED',
} as const);

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
  }
}

export class ConfigurationError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Invalid configuration: ${issues.join('; ')}`,
      ERROR_CODES.CONFIGURATION_ERROR
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class CompletionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, ERROR_CODES.COMPLETION_FAILED, { cause });
    this.name = 'CompletionError';
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
