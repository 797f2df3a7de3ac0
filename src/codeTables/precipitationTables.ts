import { InvalidCode } from '../errors';
import type {
  DepositDiameterValue,
  HoursValue,
  PrecipitationAmountValue,
  RangeValue,
  SnowDepthValue,
  SnowFallValue,
} from '../types/synop.types';
import { bucketTable, defineTable, lookupTable, unencodable, type Bucket } from './CodeTable';

const DURATION_BUCKETS: readonly Bucket[] = [[0, 1], [1, 3], [3, 6], [6, null]];

/**
 * Duration and character of precipitation. Codes 0-3 and 4-7 share the same
 * durations (one period or several), so the table cannot be inverted.
 */
export const codeTable0833 = defineTable<RangeValue>({
  id: '0833',
  description: 'duration and character of precipitation',
  decode(code, raw) {
    if (code === 9) {
      return { min: null, max: null, quantifier: null, unit: 'h' };
    }
    if (code > 7) {
      throw new InvalidCode(raw, 'duration and character of precipitation');
    }
    const [min, max] = DURATION_BUCKETS[code % 4];
    return { min, max, quantifier: max === null ? 'isGreater' : null, unit: 'h' };
  },
});

const PRECIPITATION_TIME_BUCKETS: readonly (Bucket | null)[] = [
  null, [0, 1], [1, 2], [2, 3], [3, 4], [4, 5], [5, 6], [6, 12], [12, null],
];

export const codeTable3552 = bucketTable('3552', 'time at which precipitation began or ended', PRECIPITATION_TIME_BUCKETS, {
  unit: 'h',
  openQuantifier: 'isGreater',
  unknownCode: 9,
});

/** Region I time of beginning or end of precipitation */
export const codeTable168 = bucketTable('168', 'time of beginning or end of precipitation', PRECIPITATION_TIME_BUCKETS, {
  unit: 'h',
  openQuantifier: 'isGreater',
  unknownCode: 9,
});

/** Region I character and intensity of precipitation */
export const codeTable167 = lookupTable<string>('167', 'character and intensity of precipitation', [
  'No precipitation',
  'Light intermittent',
  'Moderate intermittent',
  'Heavy intermittent',
  'Very heavy intermittent',
  'Light continuous',
  'Moderate continuous',
  'Heavy continuous',
  'Very heavy continuous',
  'Variable intensity',
]);

function amount(value: number, extra: Partial<PrecipitationAmountValue> = {}): PrecipitationAmountValue {
  return { value, quantifier: null, trace: false, unit: 'mm', ...extra };
}

/** Amount of precipitation in RRR: whole millimetres, 990 trace, 991-999 tenths */
export const codeTable3590 = defineTable<PrecipitationAmountValue>({
  id: '3590',
  description: 'amount of precipitation',
  decode(code, raw) {
    if (code > 999) {
      throw new InvalidCode(raw, 'amount of precipitation');
    }
    if (code <= 988) {
      return amount(code);
    }
    if (code === 989) {
      return amount(989, { quantifier: 'isGreaterOrEqual' });
    }
    if (code === 990) {
      return amount(0, { trace: true });
    }
    return amount((code - 990) / 10);
  },
  encode(value) {
    if (value.trace) {
      return 990;
    }
    if (value.quantifier === 'isGreaterOrEqual' || value.value >= 989) {
      return 989;
    }
    if (value.value > 0 && value.value < 1) {
      return 990 + Math.max(1, Math.round(value.value * 10));
    }
    if (value.value < 0) {
      throw unencodable('3590', value.value);
    }
    return Math.round(value.value);
  },
});

/** Total 24-hour precipitation in RRRR tenths of a millimetre */
export const codeTable3590A = defineTable<PrecipitationAmountValue>({
  id: '3590A',
  description: 'total amount of precipitation in 24 hours',
  decode(code, raw) {
    if (code > 9999) {
      throw new InvalidCode(raw, 'total amount of precipitation in 24 hours');
    }
    if (code === 9998) {
      return amount(999.8, { quantifier: 'isGreaterOrEqual' });
    }
    if (code === 9999) {
      return amount(0, { trace: true });
    }
    return amount(code / 10);
  },
  encode(value) {
    if (value.trace) {
      return 9999;
    }
    if (value.quantifier === 'isGreaterOrEqual' || value.value >= 999.8) {
      return 9998;
    }
    if (value.value < 0) {
      throw unencodable('3590A', value.value);
    }
    return Math.round(value.value * 10);
  },
});

const REFERENCE_PERIODS: readonly (number | null)[] = [null, 6, 12, 18, 24, 1, 2, 3, 9, 15];

/** Duration of the period of reference for precipitation, ending at the observation */
export const codeTable4019 = defineTable<HoursValue>({
  id: '4019',
  description: 'duration of period of reference for amount of precipitation',
  decode(code, raw) {
    const hours = REFERENCE_PERIODS[code];
    if (hours === undefined || hours === null) {
      throw new InvalidCode(raw, 'duration of period of reference for amount of precipitation');
    }
    return { value: hours, unit: 'h' };
  },
  encode(value) {
    const code = REFERENCE_PERIODS.indexOf(value.value);
    if (code < 1) {
      throw unencodable('4019', value.value);
    }
    return code;
  },
});

function diameter(value: number | null, extra: Partial<DepositDiameterValue> = {}): DepositDiameterValue {
  return { value, quantifier: null, non_measurable: false, impossible: false, unit: 'mm', ...extra };
}

/** Diameter of a deposit in millimetres */
export const codeTable3570 = defineTable<DepositDiameterValue>({
  id: '3570',
  description: 'diameter or thickness of deposit',
  decode(code, raw) {
    if (code > 99) {
      throw new InvalidCode(raw, 'diameter or thickness of deposit');
    }
    if (code <= 55) {
      return diameter(code);
    }
    if (code <= 90) {
      return diameter((code - 50) * 10);
    }
    if (code <= 96) {
      return diameter((code - 90) / 10);
    }
    if (code === 97) {
      return diameter(null, { non_measurable: true });
    }
    if (code === 98) {
      return diameter(400, { quantifier: 'isGreater' });
    }
    return diameter(null, { impossible: true });
  },
  encode(value) {
    if (value.non_measurable) {
      return 97;
    }
    if (value.impossible) {
      return 99;
    }
    const mm = value.value;
    if (value.quantifier === 'isGreater' || (mm !== null && mm > 400)) {
      return 98;
    }
    if (mm === null || mm < 0) {
      throw unencodable('3570', value);
    }
    if (mm > 0 && mm < 1) {
      return 90 + Math.max(1, Math.round(mm * 10));
    }
    if (mm <= 55) {
      return Math.round(mm);
    }
    return Math.round(mm / 10) + 50;
  },
});

function snowFall(value: number | null, extra: Partial<SnowFallValue> = {}): SnowFallValue {
  return { value, quantifier: null, inaccurate: false, unit: 'mm', ...extra };
}

/** Depth of newly fallen snow in millimetres */
export const codeTable3870 = defineTable<SnowFallValue>({
  id: '3870',
  description: 'depth of newly fallen snow',
  decode(code, raw) {
    if (code > 99) {
      throw new InvalidCode(raw, 'depth of newly fallen snow');
    }
    if (code <= 55) {
      return snowFall(code * 10);
    }
    if (code <= 90) {
      return snowFall((code - 50) * 100);
    }
    if (code <= 96) {
      return snowFall(code - 90);
    }
    if (code === 97) {
      return snowFall(1, { quantifier: 'isLess' });
    }
    if (code === 98) {
      return snowFall(4000, { quantifier: 'isGreater' });
    }
    return snowFall(null, { inaccurate: true });
  },
  encode(value) {
    if (value.inaccurate) {
      return 99;
    }
    if (value.quantifier === 'isLess') {
      return 97;
    }
    const mm = value.value;
    if (value.quantifier === 'isGreater' || (mm !== null && mm > 4000)) {
      return 98;
    }
    if (mm === null || mm < 0) {
      throw unencodable('3870', value);
    }
    if (mm > 0 && mm < 10) {
      return 90 + Math.max(1, Math.min(6, Math.round(mm)));
    }
    if (mm <= 550) {
      return Math.round(mm / 10);
    }
    return Math.max(56, Math.round(mm / 100) + 50);
  },
});

function snowDepth(value: number | null, extra: Partial<SnowDepthValue> = {}): SnowDepthValue {
  return { value, quantifier: null, continuous: true, impossible: false, unit: 'cm', ...extra };
}

/** Total depth of snow in centimetres */
export const codeTable3889 = defineTable<SnowDepthValue>({
  id: '3889',
  description: 'total depth of snow',
  decode(code, raw) {
    if (code === 0 || code > 999) {
      throw new InvalidCode(raw, 'total depth of snow');
    }
    if (code <= 996) {
      return snowDepth(code);
    }
    if (code === 997) {
      return snowDepth(0.5, { quantifier: 'isLess' });
    }
    if (code === 998) {
      return snowDepth(null, { continuous: false });
    }
    return snowDepth(null, { impossible: true });
  },
  encode(value) {
    if (value.impossible) {
      return 999;
    }
    if (!value.continuous) {
      return 998;
    }
    if (value.quantifier === 'isLess' || (value.value !== null && value.value < 0.5)) {
      return 997;
    }
    if (value.value === null || value.value > 996) {
      throw unencodable('3889', value);
    }
    return Math.max(1, Math.round(value.value));
  },
});
