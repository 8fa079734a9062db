export type ErrorCode =
  | "VALIDATION_ERROR"
  | "RATE_NOT_FOUND"
  | "NO_CARRIER_AVAILABLE"
  | "COMPLIANCE_BLOCKED"
  | "QUOTE_NOT_FOUND"
  | "QUOTE_EXPIRED"
  | "UNAUTHORIZED"
  | "INVARIANT_VIOLATION";

/**
 * Base class for every failure the underwriting core reports.
 * `httpStatus` is what the API boundary answers with.
 */
export abstract class UnderwritingError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string, readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { code: ErrorCode; message: string; details: Record<string, unknown> } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class ValidationError extends UnderwritingError {
  readonly code = "VALIDATION_ERROR";
  readonly httpStatus = 400;

  constructor(message: string, readonly field?: string) {
    super(message, field ? { field } : {});
  }
}

/** A rate curve or curve entry is missing; the rate data is incomplete. */
export class RateNotFoundError extends UnderwritingError {
  readonly code = "RATE_NOT_FOUND";
  readonly httpStatus = 500;

  constructor(readonly productCode: string, readonly dimension: string, readonly key?: string) {
    super(
      key === undefined
        ? `No ${dimension} rate curve configured for product ${productCode}`
        : `No ${dimension} rate for '${key}' in ${productCode} curve`,
      { productCode, dimension, key }
    );
  }
}

export class NoCarrierAvailableError extends UnderwritingError {
  readonly code = "NO_CARRIER_AVAILABLE";
  readonly httpStatus = 422;

  constructor(message: string, readonly reasons: Record<string, string> = {}) {
    super(message, { reasons });
  }
}

export class ComplianceBlockedError extends UnderwritingError {
  readonly code = "COMPLIANCE_BLOCKED";
  readonly httpStatus = 422;

  constructor(readonly ruleIds: string[], readonly version: string) {
    super(`Blocked by compliance: ${ruleIds.join(", ")}`, { ruleIds, version });
  }
}

export class QuoteNotFoundError extends UnderwritingError {
  readonly code = "QUOTE_NOT_FOUND";
  readonly httpStatus = 404;

  constructor(readonly quoteId: string) {
    super(`Quote ${quoteId} not found`, { quoteId });
  }
}

export class QuoteExpiredError extends UnderwritingError {
  readonly code = "QUOTE_EXPIRED";
  readonly httpStatus = 409;

  constructor(readonly quoteId: string, readonly status: string) {
    super(`Quote ${quoteId} is ${status} and can no longer be bound`, { quoteId, status });
  }
}

export class UnauthorizedError extends UnderwritingError {
  readonly code = "UNAUTHORIZED";
  readonly httpStatus = 401;

  constructor(message = "Missing or invalid bearer token") {
    super(message);
  }
}

/** Programming-level fault: should be impossible with valid configuration. */
export class InvariantViolationError extends UnderwritingError {
  readonly code = "INVARIANT_VIOLATION";
  readonly httpStatus = 500;
}

export function isUnderwritingError(err: unknown): err is UnderwritingError {
  return err instanceof UnderwritingError;
}
