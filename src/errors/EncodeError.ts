/**
 * Raised when a report cannot be turned back into a telegram: a required
 * field is missing or a value falls outside every code the field allows.
 */
export class EncodeError extends Error {
  constructor(message: string) {
    super(`encoding error: ${message}`);
    this.name = 'EncodeError';
    Object.setPrototypeOf(this, EncodeError.prototype);
  }
}
