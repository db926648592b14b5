/**
 * Error taxonomy shared by the parser, the DDI client, the sync services and
 * the HTTP layer.
 *
 * Attribute conflicts found during reconciliation are data
 * (`AttributeConflict`), and partial failures of an apply run are reported in
 * the job outcome; neither is thrown.
 */

// ============================================================================
// Input and configuration errors
// ============================================================================

export class ValidationError extends Error {
  code = "VALIDATION_ERROR" as const;
  statusCode = 400;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class ConfigurationError extends Error {
  code = "NOT_CONFIGURED" as const;
  statusCode = 503;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

export class NotFoundError extends Error {
  code = "NOT_FOUND" as const;
  statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

// ============================================================================
// Target store errors
// ============================================================================

/**
 * The DDI store rejected our credentials (HTTP 401). Never retried.
 */
export class AuthenticationError extends Error {
  code = "AUTHENTICATION_FAILED" as const;
  statusCode = 502;

  constructor(message = "Authentication with the DDI store failed") {
    super(message);
    this.name = "AuthenticationError";
  }
}

/**
 * All attempts of a request failed with a non-2xx status or a transport
 * error. `status` is undefined when the last attempt never got a response.
 */
export class TransientError extends Error {
  code = "UPSTREAM_UNAVAILABLE" as const;
  statusCode = 502;
  status?: number;
  body?: string;
  attempts: number;

  constructor(
    message: string,
    options: { status?: number; body?: string; attempts: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "TransientError";
    this.status = options.status;
    this.body = options.body;
    this.attempts = options.attempts;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
