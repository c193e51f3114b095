/**
 * Hard-failure categories. Business-rule violations found by checkBid are
 * reported as BidViolation codes instead and never thrown.
 */
export type RfqErrorCode =
  | "INVALID_PARAMETER"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INCONSISTENT_OFFER"
  | "INVALID_DELEGATE"
  | "INVALID_SIGNATURE"
  | "TRANSFER_FAILED"
  | "VIOLATION_CAPACITY_EXCEEDED";

export class RfqError extends Error {
  constructor(message: string, public readonly code: RfqErrorCode) {
    super(message);
    this.name = "RfqError";
  }
}

export class InvalidParameterError extends RfqError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETER");
    this.name = "InvalidParameterError";
  }
}

export class NotFoundError extends RfqError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class UnauthorizedError extends RfqError {
  constructor(message: string) {
    super(message, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

export class InconsistentOfferError extends RfqError {
  constructor(message: string) {
    super(message, "INCONSISTENT_OFFER");
    this.name = "InconsistentOfferError";
  }
}

export class InvalidDelegateError extends RfqError {
  constructor(message: string) {
    super(message, "INVALID_DELEGATE");
    this.name = "InvalidDelegateError";
  }
}

export class InvalidSignatureError extends RfqError {
  constructor(message: string) {
    super(message, "INVALID_SIGNATURE");
    this.name = "InvalidSignatureError";
  }
}

export class TransferFailedError extends RfqError {
  constructor(message: string) {
    super(message, "TRANSFER_FAILED");
    this.name = "TransferFailedError";
  }
}

export class ViolationCapacityError extends RfqError {
  constructor(message: string) {
    super(message, "VIOLATION_CAPACITY_EXCEEDED");
    this.name = "ViolationCapacityError";
  }
}
