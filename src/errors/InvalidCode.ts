/**
 * A single field's code is well formed but outside the range its code table
 * defines. Decoders recover from this by dropping the field.
 */
export class InvalidCode extends Error {
  public readonly code: string;
  public readonly description: string;

  constructor(code: string, description: string) {
    super(`${code} is not a valid code for ${description}`);
    this.name = 'InvalidCode';
    this.code = code;
    this.description = description;
    Object.setPrototypeOf(this, InvalidCode.prototype);
  }
}
