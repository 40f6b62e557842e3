import { ConflictError, NotFoundError } from './app-error';

/**
 * Base error class for repository-related errors
 */
export class RepositoryError extends Error {
  public readonly name: string;

  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RepositoryError';
  }
}

/**
 * Error class for holding repository specific errors
 */
export class HoldingRepositoryError extends RepositoryError {
  public readonly name: string;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'HoldingRepositoryError';
  }
}

export class HoldingNotFoundError extends NotFoundError {
  constructor(id: number) {
    super(`Holding ${id} not found`, { id });
  }
}

export class HoldingExistsError extends ConflictError {
  constructor(type: string, symbol: string) {
    super(`Holding already exists for ${type} ${symbol}`, { type, symbol });
  }
}
