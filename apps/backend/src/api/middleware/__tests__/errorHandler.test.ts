/**
 * Error Handler Tests
 */

import type { NextFunction, Request, Response } from 'express';
import {
  IndexOutOfBoundsError,
  InsufficientFundsError,
  OrderNotFoundError,
  ReentrantCallError,
} from '../../../escrow/errors';
import { errorHandler } from '../errorHandler';

describe('errorHandler', () => {
  let mockResponse: Partial<Response>;
  let jsonMock: jest.Mock;
  let statusMock: jest.Mock;
  let mockNext: NextFunction;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    jsonMock = jest.fn();
    statusMock = jest.fn().mockReturnThis();
    mockResponse = { status: statusMock, json: jsonMock, headersSent: false };
    mockNext = jest.fn();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  function handle(error: Error): void {
    errorHandler(error, {} as Request, mockResponse as Response, mockNext);
  }

  it('should keep the code and status of escrow errors', () => {
    handle(new OrderNotFoundError('0xabc'));

    expect(statusMock).toHaveBeenCalledWith(404);
    expect(jsonMock).toHaveBeenCalledWith({ error: 'ORDER_NOT_FOUND', message: 'Order not found: 0xabc' });
    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('should include the shortfall reason', () => {
    handle(new InsufficientFundsError('Custody holds 0 USDC', 'CUSTODY'));

    expect(statusMock).toHaveBeenCalledWith(409);
    expect(jsonMock).toHaveBeenCalledWith({
      error: 'INSUFFICIENT_FUNDS',
      message: 'Custody holds 0 USDC',
      reason: 'CUSTODY',
    });
  });

  it('should map re-entry to a conflict', () => {
    handle(new ReentrantCallError('execute'));

    expect(statusMock).toHaveBeenCalledWith(409);
    expect(jsonMock).toHaveBeenCalledWith(expect.objectContaining({ error: 'REENTRANT_CALL' }));
  });

  it('should log invariant violations', () => {
    handle(new IndexOutOfBoundsError(4, 2));

    expect(statusMock).toHaveBeenCalledWith(500);
    expect(jsonMock).toHaveBeenCalledWith({
      error: 'INDEX_OUT_OF_BOUNDS',
      message: 'Position 4 out of bounds for 2 orders',
    });
    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
  });

  it('should hide details of unexpected errors', () => {
    handle(new Error('database exploded'));

    expect(statusMock).toHaveBeenCalledWith(500);
    expect(jsonMock).toHaveBeenCalledWith({
      error: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
    });
  });

  it('should defer to express once headers are sent', () => {
    mockResponse.headersSent = true;
    const error = new Error('late failure');

    handle(error);

    expect(mockNext).toHaveBeenCalledWith(error);
    expect(statusMock).not.toHaveBeenCalled();
  });
});
