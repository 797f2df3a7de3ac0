export class ConversionError extends Error {
  public readonly value: number;
  public readonly from: string;
  public readonly to: string;

  constructor(value: number, from: string, to: string) {
    super(`Cannot convert ${value} from ${from} to ${to}`);
    this.name = 'ConversionError';
    this.value = value;
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, ConversionError.prototype);
  }
}
