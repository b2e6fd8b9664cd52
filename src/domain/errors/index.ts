// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ResourceNotFoundError extends DomainError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} with identifier '${identifier}' not found.`,
      'RESOURCE_NOT_FOUND',
      404
    );
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class InvalidStateTransitionError extends DomainError {
  constructor(operation: string, state: string) {
    super(
      `Operation '${operation}' is not allowed while the session is '${state}'.`,
      'INVALID_STATE_TRANSITION',
      409,
      { operation, state }
    );
  }
}

export class InsufficientStockError extends DomainError {
  constructor(productId: string, requested: number, available: number) {
    super(
      `Only ${available} available for product '${productId}', ${requested} requested.`,
      'INSUFFICIENT_STOCK',
      409,
      { productId, requested, available }
    );
  }
}

// 422 - the customer has to pick another payment method or pay on delivery
export class PixNotAllowedPrepaidError extends DomainError {
  constructor() {
    super(
      'PIX prepayment is not available for carts with items sold by weight; the final amount is only known after weighing. Pay on delivery instead.',
      'PIX_NOT_ALLOWED_PREPAID',
      422
    );
  }
}

export class UnservedNeighborhoodError extends DomainError {
  constructor(neighborhood: string) {
    super(
      `Neighborhood '${neighborhood}' is outside the delivery area.`,
      'UNSERVED_NEIGHBORHOOD',
      422,
      { neighborhood }
    );
  }
}

export class NoWeightDataError extends DomainError {
  constructor(productId: string) {
    super(
      `No average unit weight is known for product '${productId}'. Ask for the quantity in kg.`,
      'NO_WEIGHT_DATA',
      422,
      { productId }
    );
  }
}

// 503 - price and stock must never be guessed
export class OracleUnavailableError extends DomainError {
  constructor(productId: string, cause?: unknown) {
    super(
      `Price and stock information for product '${productId}' is unavailable right now.`,
      'ORACLE_UNAVAILABLE',
      503
    );
    if (cause !== undefined) this.cause = cause;
  }
}

export class OrderIntakeError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ORDER_INTAKE_FAILED', 502);
    if (cause !== undefined) this.cause = cause;
  }
}
