/**
 * Error taxonomy for the classification API
 */

export type ErrorStatus = 400 | 500 | 502 | 503;

export class AppError extends Error {
  constructor(
    message: string,
    readonly status: ErrorStatus,
    readonly stage?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// Malformed or incomplete pollutant input
export class ValidationError extends AppError {
  constructor(message: string, readonly field?: string) {
    super(message, 400, "validation");
  }
}

// The load failure stays in `reason` for logs; it names server paths
export class ModelUnavailableError extends AppError {
  constructor(readonly reason?: string) {
    super("ML models not loaded properly", 503, "model");
  }
}

export type UpstreamErrorKind = "config" | "fetch" | "parse";

export class UpstreamError extends AppError {
  constructor(message: string, readonly kind: UpstreamErrorKind) {
    super(message, 502, `upstream:${kind}`);
  }
}

export class InternalError extends AppError {
  constructor(stage: string, cause: unknown) {
    super(`${stage} stage failed: ${describeError(cause)}`, 500, stage);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ErrorResponse {
  status: ErrorStatus;
  body: { success: false; error: string };
}

/**
 * Map any thrown value to the status and body sent back to the caller.
 * Unknown failures keep their context but never their stack.
 */
export function toErrorResponse(error: unknown, context: string): ErrorResponse {
  if (error instanceof AppError && !(error instanceof InternalError)) {
    console.warn(`⚠️ ${context}: ${error.message}`);
    return { status: error.status, body: { success: false, error: error.message } };
  }

  console.error(`❌ ${context}:`, error);
  const stage = error instanceof InternalError ? ` (${error.stage} stage)` : "";
  return {
    status: 500,
    body: { success: false, error: `${context}${stage}` },
  };
}
