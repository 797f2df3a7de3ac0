import { InvalidCode } from '../errors';
import type {
  CloudCoverValue,
  CloudElevationValue,
  CloudGenus,
  CloudHeightValue,
  Quantifier,
} from '../types/synop.types';
import {
  bucketTable,
  defineTable,
  findBucket,
  lookupTable,
  simpleTable,
  unencodable,
  type Bucket,
} from './CodeTable';

export const CLOUD_GENERA: readonly CloudGenus[] = ['Ci', 'Cc', 'Cs', 'Ac', 'As', 'Ns', 'Sc', 'St', 'Cu', 'Cb'];

export const codeTable0500 = lookupTable<CloudGenus>('0500', 'genus of cloud', CLOUD_GENERA);
export const codeTable0509 = simpleTable('0509', 'clouds of the genera Ci, Cc and Cs', 0, 9);
export const codeTable0513 = simpleTable('0513', 'clouds of the genera Sc, St, Cu and Cb', 0, 9);
export const codeTable0515 = simpleTable('0515', 'clouds of the genera Ac, As and Ns', 0, 9);
export const codeTable0521 = simpleTable('0521', 'type of special cloud', 1, 5);
export const codeTable2745 = simpleTable('2745', 'cloud conditions over mountains and passes', 0, 9);
export const codeTable2754 = simpleTable('2754', 'fog, mist or low cloud in valleys or plains', 0, 9);
export const codeTable2863 = simpleTable('2863', 'evolution of clouds over mountains', 0, 9);
export const codeTable2864 = simpleTable('2864', 'evolution of clouds in valleys or plains', 0, 9);

/** Height of the lowest cloud base in metres; the top bucket has no upper bound */
export const CLOUD_BASE_BUCKETS: readonly Bucket[] = [
  [0, 50], [50, 100], [100, 200], [200, 300], [300, 600],
  [600, 1000], [1000, 1500], [1500, 2000], [2000, 2500], [2500, null],
];

export const codeTable1600 = bucketTable('1600', 'height above surface of the base of the lowest cloud', CLOUD_BASE_BUCKETS, {
  unit: 'm',
  openQuantifier: 'isGreaterOrEqual',
});

export const codeTable2700 = defineTable<CloudCoverValue>({
  id: '2700',
  description: 'total cloud cover',
  decode(code, raw) {
    if (code > 9) {
      throw new InvalidCode(raw, 'total cloud cover');
    }
    if (code === 9) {
      return { value: null, obscured: true, unit: 'okta' };
    }
    return { value: code, obscured: false, unit: 'okta' };
  },
  encode(value) {
    if (value.obscured) {
      return 9;
    }
    if (value.value === null || !Number.isInteger(value.value) || value.value < 0 || value.value > 8) {
      throw unencodable('2700', value.value);
    }
    return value.value;
  },
});

const ELEVATION_ANGLES: readonly (number | null)[] = [null, 45, 30, 20, 15, 12, 9, 7, 6, 5];

/** Elevation angle of the top of a cloud: 0 top not visible, 1 at least 45°, 9 below 5° */
export const codeTable1004 = defineTable<CloudElevationValue>({
  id: '1004',
  description: 'elevation angle of the top of the cloud',
  decode(code, raw) {
    if (code > 9) {
      throw new InvalidCode(raw, 'elevation angle of the top of the cloud');
    }
    if (code === 0) {
      return { value: null, quantifier: null, visible: false, unit: 'deg' };
    }
    let quantifier: Quantifier | null = null;
    if (code === 1) {
      quantifier = 'isGreaterOrEqual';
    } else if (code === 9) {
      quantifier = 'isLess';
    }
    return { value: ELEVATION_ANGLES[code] ?? null, quantifier, visible: true, unit: 'deg' };
  },
  encode(value) {
    if (!value.visible) {
      return 0;
    }
    const code = value.value === null ? -1 : ELEVATION_ANGLES.indexOf(value.value);
    if (code < 1) {
      throw unencodable('1004', value.value);
    }
    return code;
  },
});

/**
 * Height of the base of a cloud layer. Codes 90-98 reuse the lowest cloud
 * base buckets and 99 is their open top, so a decoded value records which
 * band it came from.
 */
export const codeTable1677 = defineTable<CloudHeightValue>({
  id: '1677',
  description: 'height of the base of cloud layer',
  decode(code, raw) {
    if ((code >= 51 && code <= 55) || code > 99) {
      throw new InvalidCode(raw, 'height of the base of cloud layer');
    }
    const use90 = code >= 90;
    if (code === 0) {
      return { value: 30, quantifier: 'isLess', use90, unit: 'm' };
    }
    if (code <= 50) {
      return { value: code * 30, quantifier: null, use90, unit: 'm' };
    }
    if (code <= 80) {
      return { value: (code - 50) * 300, quantifier: null, use90, unit: 'm' };
    }
    if (code <= 88) {
      return { value: (code - 80) * 1500 + 9000, quantifier: null, use90, unit: 'm' };
    }
    if (code === 89) {
      return { value: 21000, quantifier: 'isGreater', use90, unit: 'm' };
    }
    if (code === 99) {
      return { value: 2500, quantifier: 'isGreater', use90, unit: 'm' };
    }
    const [min, max] = CLOUD_BASE_BUCKETS[code - 90];
    return { value: null, min, max, quantifier: null, use90, unit: 'm' };
  },
  encode(value, options) {
    const height = value.value ?? value.min;
    if (height === null || height === undefined) {
      throw unencodable('1677', value);
    }
    if (options.use90 ?? value.use90) {
      const bucket = findBucket(CLOUD_BASE_BUCKETS, height);
      if (bucket < 0) {
        throw unencodable('1677', value);
      }
      return 90 + bucket;
    }
    if (value.quantifier === 'isLess' || height < 30) {
      return 0;
    }
    if (height <= 1500) {
      return Math.round(height / 30);
    }
    if (height <= 9000) {
      return Math.max(56, Math.round(height / 300) + 50);
    }
    if (height <= 21000 && value.quantifier !== 'isGreater') {
      return Math.max(81, Math.round((height - 9000) / 1500) + 80);
    }
    return 89;
  },
});
