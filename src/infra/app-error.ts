export type ErrorCategory =
  | "validation"
  | "unauthorized"
  | "not_found"
  | "rate_limited"
  | "computation"
  | "upstream_unavailable"
  | "timeout"
  | "internal";

function categoryForStatus(statusCode: number): ErrorCategory {
  if (statusCode === 401 || statusCode === 403) {
    return "unauthorized";
  }
  if (statusCode === 404) {
    return "not_found";
  }
  if (statusCode === 429) {
    return "rate_limited";
  }
  if (statusCode >= 400 && statusCode < 500) {
    return "validation";
  }
  return "internal";
}

export class AppError extends Error {
  public readonly category: ErrorCategory;

  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    category?: ErrorCategory,
  ) {
    super(message);
    this.name = "AppError";
    this.category = category ?? categoryForStatus(statusCode);
  }
}

export class ValidationError extends AppError {
  constructor(code: string, message: string, statusCode = 422) {
    super(statusCode, code, message, "validation");
    this.name = "ValidationError";
  }
}

export class UnauthorizedError extends AppError {
  constructor(code: string, message: string) {
    super(401, code, message, "unauthorized");
    this.name = "UnauthorizedError";
  }
}

export class NotFoundError extends AppError {
  constructor(code: string, message: string) {
    super(404, code, message, "not_found");
    this.name = "NotFoundError";
  }
}

export class ComputationError extends AppError {
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(500, code, message, "computation");
    this.name = "ComputationError";
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

export class UpstreamUnavailableError extends AppError {
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(503, code, message, "upstream_unavailable");
    this.name = "UpstreamUnavailableError";
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

export class RequestTimeoutError extends AppError {
  constructor(message = "Request was cancelled before the result was ready.") {
    super(504, "request_timeout", message, "timeout");
    this.name = "RequestTimeoutError";
  }
}
