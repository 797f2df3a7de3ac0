import { InvalidCode } from '../errors';
import type {
  CodeValue,
  EvaporationTypeValue,
  PeriodValue,
  RegionValue,
  SurfaceValue,
  WmoRegion,
} from '../types/synop.types';
import { convert } from '../utils/conversion';
import { defineTable, lookupTable, simpleTable, unencodable } from './CodeTable';

const BUOY_REGIONS: readonly (WmoRegion | null)[] = [null, 'I', 'II', 'III', 'IV', 'V', 'VI', 'Antarctic'];
const BUOY_REGION_PATTERN = /^(1[1-7]|2[1-6]|3[1-4]|4[1-8]|5[1-6]|6[1-6]|7[1-4])$/;

/** WMO region of a buoy or platform from the first two figures of its identifier */
export const codeTable0161 = defineTable<RegionValue>({
  id: '0161',
  description: 'WMO regional association area',
  decode(_code, raw) {
    const region = BUOY_REGION_PATTERN.test(raw) ? BUOY_REGIONS[parseInt(raw[0], 10)] : null;
    if (region === undefined || region === null) {
      throw new InvalidCode(raw, 'WMO regional association area');
    }
    return { value: region };
  },
});

export const codeTable0200 = simpleTable('0200', 'characteristic of pressure tendency', 0, 8);
export const codeTable0901 = simpleTable('0901', 'state of the ground without snow or measurable ice cover', 0, 9);
export const codeTable0975 = simpleTable('0975', 'state of the ground with snow or measurable ice cover', 0, 9);
export const codeTable3333 = simpleTable('3333', 'quadrant of the globe', 1, 7, [1, 3, 5, 7]);
export const codeTable3764 = simpleTable('3764', 'type of frozen deposit', 0, 9);
export const codeTable3765 = simpleTable('3765', 'character of snow cover', 0, 9);
export const codeTable3766 = simpleTable('3766', 'drifting and blowing snow', 0, 9);
export const codeTable3775 = simpleTable('3775', 'regularity of snow cover', 0, 9);
export const codeTable3776 = simpleTable('3776', 'evolution of drift snow', 0, 9);
export const codeTable3955 = simpleTable('3955', 'variation of temperature at time of deposit', 0, 9);
export const codeTable4531 = simpleTable('4531', 'past weather reported from an automatic station', 0, 9);
export const codeTable4561 = simpleTable('4561', 'past weather', 0, 9);
export const codeTable4677 = simpleTable('4677', 'present weather', 0, 99);
export const codeTable4680 = simpleTable('4680', 'present weather reported from an automatic station', 0, 99);

const ISOBARIC_SURFACES: readonly (number | null)[] = [null, 1000, 925, null, null, 500, null, 700, 850];

export const codeTable0264 = defineTable<SurfaceValue>({
  id: '0264',
  description: 'standard isobaric surface',
  decode(code, raw) {
    const surface = ISOBARIC_SURFACES[code];
    if (surface === undefined || surface === null) {
      throw new InvalidCode(raw, 'standard isobaric surface');
    }
    return { value: surface, unit: 'hPa' };
  },
  encode(value) {
    const code = ISOBARIC_SURFACES.indexOf(value.value);
    if (code < 1) {
      throw unencodable('0264', value.value);
    }
    return code;
  },
});

/** Evaporimeter or crop type; only the kind of measurement survives decoding */
export const codeTable1806 = defineTable<EvaporationTypeValue>({
  id: '1806',
  description: 'type of instrumentation for evaporation measurement or type of crop',
  decode(code) {
    return { value: code <= 4 ? 'evaporation' : 'evapotranspiration' };
  },
});

export const codeTable1861 = lookupTable<string>('1861', 'intensity of phenomenon', [
  'Slight',
  'Moderate',
  'Heavy or strong',
]);

export const codeTable5161 = lookupTable<string>('5161', 'optical phenomena', [
  'Brocken spectre',
  'Rainbow',
  'Solar or lunar halo',
  'Parhelia or anthelia',
  'Sun pillar',
  'Corona',
  'Twilight glow',
  'Twilight glow on the mountains',
  'Mirage',
  'Zodiacal light',
]);

/**
 * Time before observation: 00-60 in six-minute steps, 61-68 hour ranges,
 * 69 unknown.
 */
export const codeTable4077T = defineTable<PeriodValue>({
  id: '4077',
  description: 'time before observation or duration of phenomena',
  decode(code, raw) {
    if (code <= 60) {
      return { value: code * 6, unit: 'min' };
    }
    if (code <= 66) {
      return { min: code - 55, max: code - 54, quantifier: null, unit: 'h' };
    }
    if (code === 67) {
      return { min: 12, max: 18, quantifier: null, unit: 'h' };
    }
    if (code === 68) {
      return { min: 18, max: null, quantifier: 'isGreater', unit: 'h' };
    }
    if (code === 69) {
      return { unknown: true, unit: 'h' };
    }
    throw new InvalidCode(raw, 'time before observation or duration of phenomena');
  },
  encode(value) {
    if (value.unknown) {
      return 69;
    }
    if (value.min !== undefined) {
      const min = convert(value.min, value.unit, 'h', 'time');
      if (value.max === null) {
        return 68;
      }
      if (min === 12) {
        return 67;
      }
      if (Number.isInteger(min) && min >= 6 && min <= 11) {
        return min + 55;
      }
      throw unencodable('4077', value);
    }
    if (value.value === undefined) {
      throw unencodable('4077', value);
    }
    const minutes = convert(value.value, value.unit, 'min', 'time');
    if (minutes < 0 || minutes > 360) {
      throw unencodable('4077', value);
    }
    return Math.round(minutes / 6);
  },
});

/** Variability, location or intensity of phenomena (codes 76-99) */
export const codeTable4077Z = defineTable<CodeValue>({
  id: '4077',
  description: 'variability, location or intensity of phenomena',
  simple: true,
  decode(code, raw) {
    if (code < 76 || code > 99) {
      throw new InvalidCode(raw, 'variability, location or intensity of phenomena');
    }
    return { value: code };
  },
  encode(value) {
    if (value.value < 76 || value.value > 99) {
      throw unencodable('4077', value.value);
    }
    return value.value;
  },
});
