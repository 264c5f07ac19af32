export type TokenBucketErrorCode = 'INVALID_CONFIG' | 'INVALID_COUNT';

/** Base class for misuse of a bucket. Being rate limited is not one of these. */
export class TokenBucketError extends Error {
  readonly code: TokenBucketErrorCode;

  constructor(code: TokenBucketErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Thrown at construction when `rate` or `capacity` is unusable. */
export class InvalidBucketConfigError extends TokenBucketError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, reason = 'must be a finite number greater than 0') {
    super('INVALID_CONFIG', `Invalid token bucket ${field}: ${String(value)} ${reason}`);
    this.field = field;
    this.value = value;
  }
}

export class InvalidTokenCountError extends TokenBucketError {
  readonly count: number;

  constructor(count: number) {
    super('INVALID_COUNT', `Invalid token count: ${String(count)} must be a finite number >= 0`);
    this.count = count;
  }
}

export function assertPositiveFinite(field: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new InvalidBucketConfigError(field, value);
  }
}

export function assertValidCount(count: number): void {
  if (typeof count !== 'number' || !Number.isFinite(count) || count < 0) {
    throw new InvalidTokenCountError(count);
  }
}
