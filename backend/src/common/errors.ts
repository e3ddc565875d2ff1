/**
 * Application Errors
 *
 * Thrown from route handlers; the global error handler in app.ts turns them
 * into { ok: false, error, message, details? } with the carried status code.
 */

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(code: string, message: string) {
    super(code, message, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Zod issue list → "path -> message" lines
 */
export function formatIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>
): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(' -> ')}: ${issue.message}` : issue.message
  );
}
