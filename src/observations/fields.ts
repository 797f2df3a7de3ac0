import {
  codeTable0500,
  codeTable0700,
  codeTable0877,
  codeTable2700,
  codeTable3590,
  codeTable4019,
  codeTable4377,
} from '../codeTables';
import type { Measure } from '../types/synop.types';
import { parseCode } from '../codeTables/CodeTable';
import {
  inUnit,
  isAvailable,
  numericField,
  pad,
  signedTemperature,
  slashes,
  tableField,
  type FieldCodec,
} from './Observation';

// Fields shared by several sections

export const direction = tableField(codeTable0700, 1);
export const windDirection = tableField(codeTable0877, 2);
export const cloudGenus = tableField(codeTable0500, 1);
export const cloudCover = tableField(codeTable2700, 1);
export const visibility = tableField(codeTable4377, 2);
export const temperature = signedTemperature('temperature');
export const precipitationAmount = tableField(codeTable3590, 3);
export const precipitationPeriod = tableField(codeTable4019, 1);

/**
 * Pressure in tenths of a hectopascal with the thousands figure omitted:
 * codes below 1000 are read as 1000 hPa or more.
 */
export const pressure = numericField({
  description: 'pressure',
  width: 4,
  unit: 'hPa',
  unitType: 'pressure',
  toValue: (code) => (code < 1000 ? code + 10000 : code) / 10,
  toCode: (value) => Math.round(value * 10) % 10000,
});

/** Wind speed in the unit announced by the wind indicator */
export function windSpeed(width: number): FieldCodec<Measure> {
  const description = 'wind speed';
  return {
    description,
    width,
    decode(raw, options = {}) {
      if (!isAvailable(raw)) {
        return null;
      }
      const value = parseCode(raw, description);
      return options.windUnit === undefined ? { value } : { value, unit: options.windUnit };
    },
    encode(speed, options = {}) {
      if (speed === null || speed === undefined) {
        return slashes(width);
      }
      return pad(Math.round(inUnit(speed, options.windUnit, 'speed')), width, description);
    },
  };
}

/** Whole hours or minutes, as in exact observation times */
export const clockField = (description: string, max: number): FieldCodec<Measure> => numericField({
  description,
  width: 2,
  min: 0,
  max,
});
