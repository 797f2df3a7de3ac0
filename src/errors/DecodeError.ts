/**
 * Raised when a report cannot be decoded at all: a malformed mandatory
 * group, an unknown station type or a failed region lookup.
 */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}
