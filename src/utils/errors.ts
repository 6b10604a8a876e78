export const ERROR_CODES = ["NOT_FOUND", "VALIDATION", "UPSTREAM_ERROR", "CONFIRMATION_REQUIRED"] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, status: number, details?: Record<string, unknown>) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export function notFound(message: string, details?: Record<string, unknown>): AppError {
  return new AppError("NOT_FOUND", message, 404, details);
}

export function validationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError("VALIDATION", message, 400, details);
}

export function confirmationRequired(message: string, details?: Record<string, unknown>): AppError {
  return new AppError("CONFIRMATION_REQUIRED", message, 409, details);
}

export function asAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  // Unexpected faults surface as UPSTREAM_ERROR.
  if (error instanceof Error) {
    return new AppError("UPSTREAM_ERROR", error.message, 502);
  }

  return new AppError("UPSTREAM_ERROR", "Unknown error", 502);
}

export function conciseErrorText(error: unknown): string {
  const appError = asAppError(error);
  return `${appError.code}: ${appError.message}`;
}
