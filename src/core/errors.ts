import { ErrorResponse, ProductName } from './types';

// Base domain error class
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: string;

  constructor(message: string, public readonly details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

// Validation error for invalid input (400)
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, { field, value, ...details });
  }

  static malformedJson(reason: string): ValidationError {
    return new ValidationError(`Malformed JSON body: ${reason}`, 'body');
  }
}

// Store cannot be reached (503)
export class ConnectivityError extends DomainError {
  readonly code = 'CONNECTIVITY_ERROR';
  readonly statusCode = 503;

  static unreachable(cause: unknown): ConnectivityError {
    return new ConnectivityError(
      `Inventory store is unreachable: ${describeCause(cause)}`,
      undefined,
      { cause }
    );
  }
}

// Read statement or transaction start failed (500)
export class QueryError extends DomainError {
  readonly code = 'QUERY_ERROR';
  readonly statusCode = 500;

  constructor(message: string, public readonly operation: string, options?: ErrorOptions) {
    super(message, { operation }, options);
  }

  static failed(operation: string, cause: unknown): QueryError {
    return new QueryError(`${operation} failed: ${describeCause(cause)}`, operation, { cause });
  }
}

// Insert, decrement or commit failed; nothing was persisted (400)
export class WriteError extends DomainError {
  readonly code = 'WRITE_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly operation: string, options?: ErrorOptions) {
    super(message, { operation }, options);
  }

  static failed(operation: string, cause: unknown): WriteError {
    return new WriteError(`${operation} failed: ${describeCause(cause)}`, operation, { cause });
  }

  static commitFailed(operation: string, cause: unknown): WriteError {
    return new WriteError(`${operation} failed to commit: ${describeCause(cause)}`, operation, { cause });
  }

  // Products are immutable once uploaded
  static productRegistered(operation: string, productName: ProductName): WriteError {
    return new WriteError(`${operation} failed: product ${productName} is already registered`, operation);
  }

  static duplicateProduct(operation: string, productName: ProductName): WriteError {
    return new WriteError(`${operation} failed: product ${productName} appears more than once in the upload`, operation);
  }
}

// Not found error for unknown products (404)
export class ProductNotFoundError extends DomainError {
  readonly code = 'PRODUCT_NOT_FOUND_ERROR';
  readonly statusCode = 404;

  constructor(public readonly productName: ProductName) {
    super('this product is not in system, cannot be sold', { productName });
  }
}

// Business rule: every article of the product must cover its amount (409)
export class OutOfStockError extends DomainError {
  readonly code = 'OUT_OF_STOCK_ERROR';
  readonly statusCode = 409;

  constructor(
    public readonly productName: ProductName,
    public readonly missingArticles: number
  ) {
    super('this product is not in stock, cannot be sold', { productName, missingArticles });
  }
}

// Error factory for creating standardized error responses
export class ErrorFactory {
  static createErrorResponse(error: DomainError): ErrorResponse {
    return {
      success: false,
      error: {
        name: error.name,
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        timestamp: error.timestamp,
        details: error.details,
      },
    };
  }
}
