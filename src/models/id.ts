import { v4 as uuidv4 } from 'uuid';

/**
 * Error thrown when an Id value is empty or cannot be used as a file name.
 */
export class IdError extends Error {
  public readonly value: string;

  constructor(value: string) {
    super(`Invalid id ${JSON.stringify(value)}: ids must be a non-empty single path segment`);
    this.name = 'IdError';
    this.value = value;
  }
}

/**
 * Opaque identifier for accounts.
 *
 * Serializes transparently as a plain string in JSON.
 */
export class Id {
  private readonly inner: string;

  private constructor(value: string) {
    this.inner = value;
  }

  /** Create a new random Id (UUID v4). */
  static new(): Id {
    return new Id(uuidv4());
  }

  /**
   * Create an Id from a string, validating that it is a safe path segment.
   * Throws IdError otherwise.
   */
  static fromString(value: string): Id {
    if (!Id.isPathSafe(value)) {
      throw new IdError(value);
    }
    return new Id(value);
  }

  static isPathSafe(value: string): boolean {
    if (value === '' || value === '.' || value === '..') return false;
    return !/[/\\\0]/.test(value);
  }

  asStr(): string {
    return this.inner;
  }

  equals(other: Id): boolean {
    return this.inner === other.inner;
  }

  toString(): string {
    return this.inner;
  }

  toJSON(): string {
    return this.inner;
  }
}
