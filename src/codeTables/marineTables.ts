import { InvalidCode } from '../errors';
import type { IceSourceValue, TextValue, WetBulbValue } from '../types/synop.types';
import { defineTable, lookupTable, simpleTable, unencodable } from './CodeTable';

export const codeTable0439 = simpleTable('0439', 'ice of land origin', 0, 9);
export const codeTable0639 = simpleTable('0639', 'concentration or arrangement of sea ice', 0, 9);
export const codeTable3739 = simpleTable('3739', 'stage of development of sea ice', 0, 9);
export const codeTable5239 = simpleTable('5239', 'present ice situation and trend of conditions', 0, 9);
export const codeTable3700 = simpleTable('3700', 'state of the sea', 0, 9);

const ICE_SOURCES: readonly (IceSourceValue | null)[] = [
  null,
  { spray: true, fog: false, rain: false },
  { spray: false, fog: true, rain: false },
  { spray: true, fog: true, rain: false },
  { spray: false, fog: false, rain: true },
  { spray: true, fog: false, rain: true },
];

export const codeTable1751 = defineTable<IceSourceValue>({
  id: '1751',
  description: 'ice accretion on ships',
  decode(code, raw) {
    const source = ICE_SOURCES[code];
    if (source === undefined || source === null) {
      throw new InvalidCode(raw, 'ice accretion on ships');
    }
    return { ...source };
  },
  encode(value) {
    const code = ICE_SOURCES.findIndex((source) => source !== null
      && source.spray === value.spray
      && source.fog === value.fog
      && source.rain === value.rain);
    if (code < 0) {
      throw unencodable('1751', value);
    }
    return code;
  },
});

export const codeTable3551 = lookupTable<string>('3551', 'rate of ice accretion on ships', [
  'Ice not building up',
  'Ice building up slowly',
  'Ice building up rapidly',
  'Ice melting or breaking up slowly',
  'Ice melting or breaking up rapidly',
]);

export const SST_METHODS: readonly string[] = ['Intake', 'Bucket', 'Hull contact sensor', 'Other'];

/**
 * Sign and type of sea surface temperature measurement. The method is
 * `code >> 1` and an odd code means a negative temperature; `encode`
 * returns the positive (even) code and callers add the sign bit.
 */
export const codeTable3850 = defineTable<TextValue>({
  id: '3850',
  description: 'sign and type of measurement of sea surface temperature',
  decode(code, raw) {
    const method = SST_METHODS[code >> 1];
    if (code > 7 || method === undefined) {
      throw new InvalidCode(raw, 'sign and type of measurement of sea surface temperature');
    }
    return { value: method };
  },
  encode(value) {
    const method = SST_METHODS.indexOf(value.value);
    if (method < 0) {
      throw unencodable('3850', value.value);
    }
    return method << 1;
  },
});

const WET_BULB_TYPES: Readonly<Record<number, WetBulbValue>> = {
  0: { sign: 1, measured: true, iced: false },
  1: { sign: -1, measured: true, iced: false },
  2: { sign: -1, measured: true, iced: true },
  5: { sign: 1, measured: false, iced: false },
  6: { sign: -1, measured: false, iced: false },
  7: { sign: -1, measured: false, iced: true },
};

/** Sign and type of wet-bulb temperature; an iced bulb always reads below zero */
export const codeTable3855 = defineTable<WetBulbValue>({
  id: '3855',
  description: 'sign and type of wet-bulb temperature',
  decode(code, raw) {
    const type = WET_BULB_TYPES[code];
    if (type === undefined) {
      throw new InvalidCode(raw, 'sign and type of wet-bulb temperature');
    }
    return { ...type };
  },
  encode(value) {
    const base = value.measured ? 0 : 5;
    if (value.iced) {
      return base + 2;
    }
    return value.sign === -1 ? base + 1 : base;
  },
});
