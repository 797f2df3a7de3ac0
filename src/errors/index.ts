export { DecodeError } from './DecodeError';
export { EncodeError } from './EncodeError';
export { InvalidCode } from './InvalidCode';
export { ConversionError } from './ConversionError';
