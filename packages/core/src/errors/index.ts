export class CriteriaError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'CriteriaError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends CriteriaError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class QueryStateError extends CriteriaError {
  constructor(message: string, cause?: Error) {
    super(message, 'QUERY_STATE_ERROR', cause);
    this.name = 'QueryStateError';
  }
}

export class FieldNotFoundError extends CriteriaError {
  constructor(public entity: string, public field: string) {
    super(`No such field: ${field} on ${entity}`, 'FIELD_NOT_FOUND');
    this.name = 'FieldNotFoundError';
  }
}
