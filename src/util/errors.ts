import type { ZodError } from "zod";

export type ErrorKind =
  | "validation"
  | "authentication"
  | "not_found"
  | "timeout"
  | "rate_limit"
  | "api"
  | "io"
  | "render"
  | "internal";

export class BlockError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "BlockError";
  }
}

/** Bad or missing input, raised before any I/O. */
export class ValidationError extends BlockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "validation", details);
    this.name = "ValidationError";
  }

  static fromZod(error: ZodError): ValidationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "input";
      return `${path}: ${issue.message}`;
    });
    return new ValidationError(`Invalid input - ${issues.join("; ")}`, {
      issues,
    });
  }
}

export class AuthenticationError extends BlockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "authentication", details);
    this.name = "AuthenticationError";
  }
}

export class NotFoundError extends BlockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "not_found", details);
    this.name = "NotFoundError";
  }
}

/** Network retries exhausted (timeouts or connection failures). */
export class TimeoutError extends BlockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "timeout", details);
    this.name = "TimeoutError";
  }
}

export class RateLimitError extends BlockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "rate_limit", details);
    this.name = "RateLimitError";
  }
}

export class ApiError extends BlockError {
  constructor(
    message: string,
    public readonly status?: number,
    details?: Record<string, unknown>
  ) {
    super(message, "api", { ...details, status });
    this.name = "ApiError";
  }
}

export class IOError extends BlockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "io", details);
    this.name = "IOError";
  }
}

export class RenderError extends BlockError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "render", details);
    this.name = "RenderError";
  }
}

export function isBlockError(err: unknown): err is BlockError {
  return err instanceof BlockError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps any thrown value to a BlockError; unknown failures become "internal".
 */
export function toBlockError(err: unknown): BlockError {
  if (isBlockError(err)) return err;
  return new BlockError(`Unexpected error: ${errorMessage(err)}`, "internal");
}
