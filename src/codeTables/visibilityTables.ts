import { InvalidCode } from '../errors';
import type { VisibilityValue } from '../types/synop.types';
import { bucketTable, defineTable, findBucket, unencodable, type Bucket } from './CodeTable';

/** Visibility buckets in metres shared by codes 90-99 and seaward visibility */
export const VISIBILITY_BUCKETS: readonly Bucket[] = [
  [0, 50], [50, 200], [200, 500], [500, 1000], [1000, 2000],
  [2000, 4000], [4000, 10000], [10000, 20000], [20000, 50000], [50000, null],
];

export const codeTable4300 = bucketTable('4300', 'visibility seawards', VISIBILITY_BUCKETS, {
  unit: 'm',
  openQuantifier: 'isGreater',
});

function visibility(value: number, use90: boolean, quantifier: VisibilityValue['quantifier'] = null): VisibilityValue {
  return { value, quantifier, use90, unit: 'm' };
}

/**
 * Horizontal visibility at the surface. Codes 51-55 are unused; 90-99 form
 * a coarse band selected by `use90`.
 */
export const codeTable4377 = defineTable<VisibilityValue>({
  id: '4377',
  description: 'horizontal visibility at surface',
  decode(code, raw) {
    if ((code >= 51 && code <= 55) || code > 99) {
      throw new InvalidCode(raw, 'horizontal visibility at surface');
    }
    if (code === 0) {
      return visibility(100, false, 'isLess');
    }
    if (code <= 50) {
      return visibility(code * 100, false);
    }
    if (code <= 80) {
      return visibility((code - 50) * 1000, false);
    }
    if (code <= 88) {
      return visibility((code - 74) * 5000, false);
    }
    if (code === 89) {
      return visibility(70000, false, 'isGreater');
    }
    if (code === 90) {
      return visibility(50, true, 'isLess');
    }
    if (code === 99) {
      return visibility(50000, true, 'isGreaterOrEqual');
    }
    return visibility(VISIBILITY_BUCKETS[code - 90][0], true);
  },
  encode(value, options) {
    if (options.use90 ?? value.use90) {
      if (value.quantifier === 'isLess') {
        return 90;
      }
      const bucket = findBucket(VISIBILITY_BUCKETS, value.value);
      if (bucket < 0) {
        throw unencodable('4377', value);
      }
      return 90 + bucket;
    }
    if (value.quantifier === 'isLess' || value.value < 100) {
      return 0;
    }
    if (value.value <= 5000) {
      return Math.round(value.value / 100);
    }
    if (value.value <= 30000) {
      return Math.max(56, Math.round(value.value / 1000) + 50);
    }
    if (value.value <= 70000 && value.quantifier !== 'isGreater') {
      return Math.max(81, Math.round(value.value / 5000) + 74);
    }
    return 89;
  },
});
