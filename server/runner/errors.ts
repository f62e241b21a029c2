export class RunnerError extends Error {
  code: string;
  details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'RunnerError';
  }
}

export class AuthorizationError extends RunnerError {
  constructor(message: string, details?: unknown) {
    super('AUTHORIZATION_ERROR', message, details);
    this.name = 'AuthorizationError';
  }
}

export class ValidationError extends RunnerError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/** Record missing, wrong lifecycle state, or a time precondition not reached. */
export class StateError extends RunnerError {
  constructor(message: string, details?: unknown) {
    super('STATE_ERROR', message, details);
    this.name = 'StateError';
  }
}

export class ArithmeticError extends RunnerError {
  constructor(message: string, details?: unknown) {
    super('ARITHMETIC_ERROR', message, details);
    this.name = 'ArithmeticError';
  }
}

export class TransferError extends RunnerError {
  constructor(message: string, details?: unknown) {
    super('TRANSFER_ERROR', message, details);
    this.name = 'TransferError';
  }
}

export class ExecutionError extends RunnerError {
  constructor(message: string, details?: unknown) {
    super('EXECUTION_ERROR', message, details);
    this.name = 'ExecutionError';
  }
}
