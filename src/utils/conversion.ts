import { ConversionError } from '../errors';

export type UnitType = 'time' | 'length' | 'pressure' | 'speed' | 'temperature';

const SI_PREFIXES: Record<string, number> = {
  m: -3,
  c: -2,
  d: -1,
  '': 0,
  da: 1,
  h: 2,
  k: 3,
};

const TIME_FACTORS: Record<string, number> = {
  s: 1,
  min: 60,
  h: 60 * 60,
  day: 60 * 60 * 24,
};

const METRES_PER_SECOND_PER_KNOT = 1852 / 3600;
const ABSOLUTE_ZERO_CELSIUS = 273.15;

// --- Temperature ---

export function celsiusToFahrenheit(c: number): number {
  return (c * 9) / 5 + 32;
}

export function fahrenheitToCelsius(f: number): number {
  return ((f - 32) * 5) / 9;
}

// --- Speed ---

export function knotsToMetresPerSecond(kt: number): number {
  return kt * METRES_PER_SECOND_PER_KNOT;
}

export function metresPerSecondToKnots(ms: number): number {
  return ms / METRES_PER_SECOND_PER_KNOT;
}

/**
 * Splits a metric unit such as "km" or "hPa" into its SI prefix exponent.
 * Returns null when the unit does not end in the base symbol or the prefix
 * is unknown.
 */
function siExponent(unit: string, base: string): number | null {
  if (!unit.endsWith(base)) {
    return null;
  }
  const prefix = unit.slice(0, unit.length - base.length);
  const exponent = SI_PREFIXES[prefix];
  return exponent === undefined ? null : exponent;
}

function convertSi(value: number, from: string, to: string, base: string): number {
  const fromExponent = siExponent(from, base);
  const toExponent = siExponent(to, base);
  if (fromExponent === null || toExponent === null) {
    throw new ConversionError(value, from, to);
  }
  const shift = fromExponent - toExponent;
  // Divide for negative shifts so 1234 mm -> 1.234 m stays exact where possible
  return shift >= 0 ? value * 10 ** shift : value / 10 ** -shift;
}

function convertTime(value: number, from: string, to: string): number {
  const fromFactor = TIME_FACTORS[from];
  const toFactor = TIME_FACTORS[to];
  if (fromFactor === undefined || toFactor === undefined) {
    throw new ConversionError(value, from, to);
  }
  return (value * fromFactor) / toFactor;
}

function convertTemperature(value: number, from: string, to: string): number {
  if (from === to) {
    return value;
  }
  let celsius: number;
  switch (from) {
    case 'Cel':
      celsius = value;
      break;
    case 'K':
      celsius = value - ABSOLUTE_ZERO_CELSIUS;
      break;
    case 'degF':
      celsius = fahrenheitToCelsius(value);
      break;
    default:
      throw new ConversionError(value, from, to);
  }
  switch (to) {
    case 'Cel':
      return celsius;
    case 'K':
      return celsius + ABSOLUTE_ZERO_CELSIUS;
    case 'degF':
      return celsiusToFahrenheit(celsius);
    default:
      throw new ConversionError(value, from, to);
  }
}

function convertSpeed(value: number, from: string, to: string): number {
  if (from === to) {
    return value;
  }
  if (from === 'm/s' && to === 'KT') {
    return metresPerSecondToKnots(value);
  }
  if (from === 'KT' && to === 'm/s') {
    return knotsToMetresPerSecond(value);
  }
  throw new ConversionError(value, from, to);
}

/**
 * Converts a value between units of the same kind.
 *
 * Lengths and pressures accept any SI prefix on "m" and "Pa" respectively
 * (so "hPa" to "kPa" works but "ft" does not).
 */
export function convert(value: number, from: string, to: string, unitType: UnitType): number {
  switch (unitType) {
    case 'time':
      return convertTime(value, from, to);
    case 'length':
      return convertSi(value, from, to, 'm');
    case 'pressure':
      return convertSi(value, from, to, 'Pa');
    case 'speed':
      return convertSpeed(value, from, to);
    case 'temperature':
      return convertTemperature(value, from, to);
    default:
      throw new ConversionError(value, from, to);
  }
}
