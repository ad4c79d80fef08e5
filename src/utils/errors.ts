export class HttpError extends Error {
  public readonly status: number;
  public readonly details?: string[];

  constructor(status: number, message: string, details?: string[]) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.details = details;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: string[]) {
    super(400, message, details);
  }
}

/** The hosted model failed or answered with something unusable. */
export class UpstreamError extends HttpError {
  constructor(message: string, cause?: unknown) {
    super(502, message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
