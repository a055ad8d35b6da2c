export class DiaryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiaryError';
  }
}

/**
 * Raised synchronously whenever a caller breaks an input contract: a missing
 * value, a blank string, a number outside its range, an inverted date range,
 * or an entry registered under an author it does not belong to.
 */
export class InvalidArgumentError extends DiaryError {
  constructor(
    message: string,
    public readonly issues: unknown[] = [],
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class AuthorNotFoundError extends DiaryError {
  constructor(id: number) {
    super(`Author not found: ${id}. Run "workout-diary authors" to see registered authors.`);
    this.name = 'AuthorNotFoundError';
  }
}
