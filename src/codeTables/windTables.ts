import { InvalidCode } from '../errors';
import type {
  Compass,
  DirectionValue,
  IceBearingValue,
  ShipSpeedValue,
  SpeedBucket,
  WindDirectionValue,
} from '../types/synop.types';
import { defineTable, unencodable, type Bucket } from './CodeTable';

export const COMPASS_POINTS: readonly (Compass | null)[] = [null, 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW', 'N', null];

function compassCode(id: string, value: Compass | null): number {
  const code = value === null ? -1 : COMPASS_POINTS.indexOf(value);
  if (code < 0) {
    throw unencodable(id, value);
  }
  return code;
}

/** Direction in one figure: 0 stationary or calm, 9 all directions */
export const codeTable0700 = defineTable<DirectionValue>({
  id: '0700',
  description: 'direction or bearing in one figure',
  decode(code, raw) {
    if (code > 9) {
      throw new InvalidCode(raw, 'direction or bearing in one figure');
    }
    return {
      value: COMPASS_POINTS[code] ?? null,
      isCalmOrStationary: code === 0,
      allDirections: code === 9,
    };
  },
  encode(value) {
    if (value.isCalmOrStationary) {
      return 0;
    }
    if (value.allDirections) {
      return 9;
    }
    return compassCode('0700', value.value);
  },
});

/** Bearing of the principal ice edge: 0 ship in shore or flaw lead, 9 ship in ice */
export const codeTable0739 = defineTable<IceBearingValue>({
  id: '0739',
  description: 'true bearing of principal ice edge',
  decode(code, raw) {
    if (code > 9) {
      throw new InvalidCode(raw, 'true bearing of principal ice edge');
    }
    return {
      value: COMPASS_POINTS[code] ?? null,
      in_shore: code === 0,
      in_ice: code === 9,
    };
  },
  encode(value) {
    if (value.in_shore) {
      return 0;
    }
    if (value.in_ice) {
      return 9;
    }
    return compassCode('0739', value.value);
  },
});

/** Wind direction in tens of degrees: 00 calm, 99 variable or unknown */
export const codeTable0877 = defineTable<WindDirectionValue>({
  id: '0877',
  description: 'direction in tens of degrees',
  decode(code, raw) {
    if (code === 0) {
      return { value: null, calm: true, varAllUnknown: false, unit: 'deg' };
    }
    if (code === 99) {
      return { value: null, calm: false, varAllUnknown: true, unit: 'deg' };
    }
    if (code > 36) {
      throw new InvalidCode(raw, 'direction in tens of degrees');
    }
    return { value: code * 10, calm: false, varAllUnknown: false, unit: 'deg' };
  },
  encode(value) {
    if (value.calm) {
      return 0;
    }
    if (value.varAllUnknown) {
      return 99;
    }
    if (value.value === null || value.value < 0 || value.value > 360) {
      throw unencodable('0877', value.value);
    }
    // Round half up; north is reported as 36, never 00
    const code = Math.floor(value.value / 10 + 0.5);
    return code === 0 ? 36 : code;
  },
});

const KNOT_BUCKETS: readonly Bucket[] = [
  [0, 0], [1, 5], [6, 10], [11, 15], [16, 20], [21, 25], [26, 30], [31, 35], [36, 40],
];
const KMH_BUCKETS: readonly Bucket[] = [
  [0, 0], [1, 10], [11, 19], [20, 28], [29, 37], [38, 47], [48, 56], [57, 65], [66, 75],
];

function speedBucket(buckets: readonly Bucket[], code: number, unit: 'KT' | 'km/h'): SpeedBucket {
  if (code === 9) {
    const last = buckets[buckets.length - 1];
    return { min: last[1] ?? last[0], max: null, quantifier: 'isGreater', unit };
  }
  const [min, max] = buckets[code];
  return { min, max, quantifier: null, unit };
}

function speedCode(buckets: readonly Bucket[], bucket: SpeedBucket): number {
  const top = buckets[buckets.length - 1][1] ?? 0;
  if (bucket.max === null || bucket.min > top) {
    return 9;
  }
  // Buckets here are closed at both ends, so match on the lower bound
  const code = buckets.findIndex(([min, max]) => bucket.min >= min && bucket.min <= (max ?? min));
  if (code < 0) {
    throw unencodable('4451', bucket);
  }
  return code;
}

/** Ship's average speed made good, reported in knots and km/h at once */
export const codeTable4451 = defineTable<ShipSpeedValue>({
  id: '4451',
  description: "ship's average speed made good",
  decode(code, raw) {
    if (code > 9) {
      throw new InvalidCode(raw, "ship's average speed made good");
    }
    return {
      value: [speedBucket(KNOT_BUCKETS, code, 'KT'), speedBucket(KMH_BUCKETS, code, 'km/h')],
    };
  },
  encode(value) {
    const [first] = value.value;
    return speedCode(first.unit === 'KT' ? KNOT_BUCKETS : KMH_BUCKETS, first);
  },
});
