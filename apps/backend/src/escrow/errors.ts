/**
 * Escrow Errors
 * Every rejection carries a stable code and the HTTP status used by the API
 */

export type EscrowErrorCode =
  | 'INVALID_INPUT'
  | 'INVALID_FEE_ADDRESS'
  | 'INSUFFICIENT_FUNDS'
  | 'PERMISSION_DENIED'
  | 'ORDER_NOT_FOUND'
  | 'INDEX_OUT_OF_BOUNDS'
  | 'REENTRANT_CALL';

export class EscrowError extends Error {
  constructor(
    message: string,
    public readonly code: EscrowErrorCode,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'EscrowError';
    Object.setPrototypeOf(this, EscrowError.prototype);
  }
}

export class InvalidInputError extends EscrowError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT', 400);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

export class InvalidFeeAddressError extends EscrowError {
  constructor(message: string) {
    super(message, 'INVALID_FEE_ADDRESS', 400);
    this.name = 'InvalidFeeAddressError';
    Object.setPrototypeOf(this, InvalidFeeAddressError.prototype);
  }
}

/**
 * BALANCE and ALLOWANCE come from a holder's external funds,
 * CUSTODY from the engine's own holdings
 */
export type InsufficientFundsReason = 'BALANCE' | 'ALLOWANCE' | 'CUSTODY';

export class InsufficientFundsError extends EscrowError {
  constructor(
    message: string,
    public readonly reason: InsufficientFundsReason,
  ) {
    super(message, 'INSUFFICIENT_FUNDS', 409);
    this.name = 'InsufficientFundsError';
    Object.setPrototypeOf(this, InsufficientFundsError.prototype);
  }
}

export class PermissionDeniedError extends EscrowError {
  constructor(message: string) {
    super(message, 'PERMISSION_DENIED', 403);
    this.name = 'PermissionDeniedError';
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

export class OrderNotFoundError extends EscrowError {
  constructor(public readonly orderId: string) {
    super(`Order not found: ${orderId}`, 'ORDER_NOT_FOUND', 404);
    this.name = 'OrderNotFoundError';
    Object.setPrototypeOf(this, OrderNotFoundError.prototype);
  }
}

// Internal invariant violation; unreachable from validated input
export class IndexOutOfBoundsError extends EscrowError {
  constructor(
    public readonly position: number,
    public readonly length: number,
  ) {
    super(`Position ${position} out of bounds for ${length} orders`, 'INDEX_OUT_OF_BOUNDS', 500);
    this.name = 'IndexOutOfBoundsError';
    Object.setPrototypeOf(this, IndexOutOfBoundsError.prototype);
  }
}

export class ReentrantCallError extends EscrowError {
  constructor(public readonly operation: string) {
    super(`Re-entrant call to ${operation} rejected while another mutation is in progress`, 'REENTRANT_CALL', 409);
    this.name = 'ReentrantCallError';
    Object.setPrototypeOf(this, ReentrantCallError.prototype);
  }
}
