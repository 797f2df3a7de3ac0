import { EncodeError, InvalidCode } from '../errors';
import type { CodeValue, Quantifier, RangeValue } from '../types/synop.types';

export interface TableEncodeOptions {
  /** Select the 90-99 band of the visibility and cloud height tables */
  use90?: boolean;
}

/**
 * Contract shared by every WMO code table.
 *
 * `decode` throws InvalidCode for codes outside the table and `encode`
 * throws EncodeError for values no code represents. Simple tables are those
 * whose value is the code itself; fields built on them only record
 * `_table`.
 */
export interface CodeTable<T> {
  readonly id: string;
  readonly description: string;
  readonly simple: boolean;
  readonly decodeOnly: boolean;
  decode(raw: string): T;
  encode(value: T, options?: TableEncodeOptions): number;
}

interface TableDefinition<T> {
  id: string;
  description: string;
  simple?: boolean;
  decode(code: number, raw: string): T;
  encode?(value: T, options: TableEncodeOptions): number;
}

export function parseCode(raw: string, description: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidCode(raw, description);
  }
  return parseInt(raw, 10);
}

export function defineTable<T>(definition: TableDefinition<T>): CodeTable<T> {
  const { id, description, encode } = definition;
  return {
    id,
    description,
    simple: definition.simple ?? false,
    decodeOnly: encode === undefined,
    decode(raw: string): T {
      return definition.decode(parseCode(raw, description), raw);
    },
    encode(value: T, options: TableEncodeOptions = {}): number {
      if (encode === undefined) {
        throw new EncodeError(`code table ${id} (${description}) is decode-only`);
      }
      return encode(value, options);
    },
  };
}

export function unencodable(id: string, value: unknown): EncodeError {
  return new EncodeError(`${JSON.stringify(value)} has no code in table ${id}`);
}

/**
 * A table whose value is the code, restricted to `min..max` or an explicit
 * list of valid codes.
 */
export function simpleTable(
  id: string,
  description: string,
  min: number,
  max: number,
  valid?: readonly number[],
): CodeTable<CodeValue> {
  const isValid = (code: number): boolean => (valid ? valid.includes(code) : code >= min && code <= max);
  return defineTable({
    id,
    description,
    simple: true,
    decode(code, raw) {
      if (!isValid(code)) {
        throw new InvalidCode(raw, description);
      }
      return { value: code };
    },
    encode(value) {
      if (!Number.isInteger(value.value) || !isValid(value.value)) {
        throw unencodable(id, value.value);
      }
      return value.value;
    },
  });
}

/**
 * A table that indexes a list; `null` entries are codes the table does not
 * define.
 */
export function lookupTable<V extends string | number>(
  id: string,
  description: string,
  values: readonly (V | null)[],
): CodeTable<{ value: V }> {
  return defineTable({
    id,
    description,
    decode(code, raw) {
      const value = values[code];
      if (value === undefined || value === null) {
        throw new InvalidCode(raw, description);
      }
      return { value };
    },
    encode(value) {
      const code = values.indexOf(value.value);
      if (code < 0) {
        throw unencodable(id, value.value);
      }
      return code;
    },
  });
}

export type Bucket = readonly [number, number | null];

interface BucketTableOptions {
  unit?: string;
  /** Quantifier attached to the open-ended last bucket */
  openQuantifier: Quantifier;
  /** Code meaning "unknown", decoded to a bucket with both ends null */
  unknownCode?: number;
}

function bucketValue(bucket: Bucket, options: BucketTableOptions): RangeValue {
  const [min, max] = bucket;
  const value: RangeValue = {
    min,
    max,
    quantifier: max === null ? options.openQuantifier : null,
  };
  if (options.unit !== undefined) {
    value.unit = options.unit;
  }
  return value;
}

/**
 * Index of the bucket holding `value`; buckets are closed at `min` and open
 * at `max`, so a value on an edge belongs to the upper bucket.
 */
export function findBucket(buckets: readonly (Bucket | null)[], value: number): number {
  return buckets.findIndex((bucket) => {
    if (bucket === null) {
      return false;
    }
    const [min, max] = bucket;
    return value >= min && (max === null || value < max);
  });
}

export function bucketTable(
  id: string,
  description: string,
  buckets: readonly (Bucket | null)[],
  options: BucketTableOptions,
): CodeTable<RangeValue> {
  return defineTable({
    id,
    description,
    decode(code, raw) {
      if (code === options.unknownCode) {
        const unknown: RangeValue = { min: null, max: null, quantifier: null };
        if (options.unit !== undefined) {
          unknown.unit = options.unit;
        }
        return unknown;
      }
      const bucket = buckets[code];
      if (bucket === undefined || bucket === null) {
        throw new InvalidCode(raw, description);
      }
      return bucketValue(bucket, options);
    },
    encode(value) {
      if (value.min === null) {
        if (options.unknownCode !== undefined && value.max === null) {
          return options.unknownCode;
        }
        throw unencodable(id, value);
      }
      const code = findBucket(buckets, value.min);
      if (code < 0) {
        throw unencodable(id, value);
      }
      return code;
    },
  });
}
