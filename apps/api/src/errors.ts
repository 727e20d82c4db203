export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    public code: string,
    public status: number,
    message: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = "AppError";
  }
}

export function validationError(message: string, fields?: string[]) {
  return new AppError("VALIDATION_ERROR", 400, message, fields ? { fields } : undefined);
}

export function unauthorizedError() {
  return new AppError("UNAUTHORIZED", 401, "Missing caller identity");
}

export function forbiddenError(message: string) {
  return new AppError("FORBIDDEN", 403, message);
}

export function notFoundError(message = "Notification not found") {
  return new AppError("NOT_FOUND", 404, message);
}

// The underlying cause stays in logs; clients only see the stable code.
export function persistenceError(operation: string) {
  return new AppError(
    "PERSISTENCE_FAILURE",
    500,
    "Notification could not be saved",
    { operation }
  );
}

export function internalError() {
  return new AppError("INTERNAL_ERROR", 500, "Unexpected error");
}

export function errorBody(err: AppError | Error) {
  if (err instanceof AppError) {
    return {
      error: {
        code: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {})
      }
    };
  }
  return { error: { code: "INTERNAL_ERROR", message: "Unexpected error" } };
}
