/**
 * Error types and codes
 */

export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',

  // Authentication errors (401)
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  INVALID_TOKEN = 'INVALID_TOKEN',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  INVALID_OTP = 'INVALID_OTP',

  // Not found errors (404)
  NOT_FOUND = 'NOT_FOUND',
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',
  BORROWER_NOT_FOUND = 'BORROWER_NOT_FOUND',
  TRANSACTION_NOT_FOUND = 'TRANSACTION_NOT_FOUND',
  PENDING_RETURN_NOT_FOUND = 'PENDING_RETURN_NOT_FOUND',
  ADMIN_NOT_FOUND = 'ADMIN_NOT_FOUND',

  // Conflict errors (409)
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',
  OVER_RETURN = 'OVER_RETURN',
  RETURN_CONFLICT = 'RETURN_CONFLICT',
  ITEM_ARCHIVED = 'ITEM_ARCHIVED',
  DUPLICATE_SCAN_MISMATCH = 'DUPLICATE_SCAN_MISMATCH',
  ITEM_HAS_OPEN_BORROWS = 'ITEM_HAS_OPEN_BORROWS',
  BORROWER_HAS_OPEN_BORROWS = 'BORROWER_HAS_OPEN_BORROWS',
  QUANTITY_BELOW_BORROWED = 'QUANTITY_BELOW_BORROWED',
  DUPLICATE_RESOURCE = 'DUPLICATE_RESOURCE',

  // Unprocessable (422)
  INVALID_INSTRUCTOR = 'INVALID_INSTRUCTOR',
  NO_ITEMS_RETURNED = 'NO_ITEMS_RETURNED',

  // Upstream errors (502)
  NOTIFICATION_FAILED = 'NOTIFICATION_FAILED',

  // Server errors (500)
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}
