/**
 * Wrapper that keeps credentials out of logs.
 * @module auth/secret
 */

const REDACTED = '***REDACTED***';

/**
 * Holds an access token or key. Printing, string conversion and JSON
 * serialization all yield a redacted placeholder.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Returns the raw value, for request headers only.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return `SecretString(${REDACTED})`;
  }
}
