type Outcome<T, E> =
  | { readonly isSuccess: true; readonly value: T }
  | { readonly isSuccess: false; readonly error: E };

/**
 * Generic Result type for handling success/failure without exceptions.
 * Follows the Result pattern for functional error handling.
 */
export class Result<T = void, E = Error> {
  private constructor(private readonly outcome: Outcome<T, E>) {}

  static ok<T = void, E = Error>(value: T): Result<T, E> {
    return new Result<T, E>({ isSuccess: true, value });
  }

  static fail<T = void, E = Error>(error: E): Result<T, E> {
    return new Result<T, E>({ isSuccess: false, error });
  }

  get isSuccess(): boolean {
    return this.outcome.isSuccess;
  }

  get isFailure(): boolean {
    return !this.outcome.isSuccess;
  }

  getValue(): T {
    const outcome = this.outcome;
    if (!outcome.isSuccess) {
      throw new Error('Cannot get value from failed result');
    }
    return outcome.value;
  }

  getError(): E {
    const outcome = this.outcome;
    if (outcome.isSuccess) {
      throw new Error('Cannot get error from successful result');
    }
    return outcome.error;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    const outcome = this.outcome;
    if (!outcome.isSuccess) {
      return Result.fail<U, E>(outcome.error);
    }
    return Result.ok<U, E>(fn(outcome.value));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    const outcome = this.outcome;
    if (!outcome.isSuccess) {
      return Result.fail<U, E>(outcome.error);
    }
    return fn(outcome.value);
  }
}
