import type { CodeTable } from '../codeTables/CodeTable';
import { parseCode } from '../codeTables/CodeTable';
import { EncodeError, InvalidCode } from '../errors';
import type { Coded, Measure, WindUnit } from '../types/synop.types';
import { convert, type UnitType } from '../utils/conversion';
import logger from '../utils/logger';

export const UNAVAILABLE = '/';

/** Context a field may need beyond its own characters */
export interface FieldOptions {
  /** Use the 90-99 band of the visibility or cloud height tables */
  use90?: boolean;
  /** Unit wind speeds are reported in */
  windUnit?: WindUnit;
}

/**
 * Decoder and encoder for one fixed-width field. `decode` returns null when
 * the field is unavailable and throws InvalidCode when its code is out of
 * range; `encode` writes `/` across the width for a null value.
 */
export interface FieldCodec<T> {
  readonly description: string;
  readonly width: number;
  decode(raw: string, options?: FieldOptions): T | null;
  encode(value: T | null | undefined, options?: FieldOptions): string;
}

export function isAvailable(raw: string | undefined): raw is string {
  return raw !== undefined && raw.length > 0 && !/^\/+$/.test(raw);
}

export function slashes(width: number): string {
  return UNAVAILABLE.repeat(width);
}

export function pad(code: number, width: number, description = 'value'): string {
  const text = String(code).padStart(width, '0');
  if (!Number.isInteger(code) || code < 0 || text.length > width) {
    throw new EncodeError(`${code} does not fit ${width} figures for ${description}`);
  }
  return text;
}

/**
 * Decodes one field, downgrading an InvalidCode to an unavailable field and
 * a warning. Anything else propagates.
 */
export function decodeField<T>(codec: FieldCodec<T>, raw: string, options?: FieldOptions): T | null {
  try {
    return codec.decode(raw, options);
  } catch (error) {
    if (error instanceof InvalidCode) {
      logger.warn(error.message, { field: codec.description, code: raw });
      return null;
    }
    throw error;
  }
}

interface NumericFieldDefinition {
  description: string;
  width: number;
  unit?: string;
  /** Kind of unit, so values given in another unit are converted on encode */
  unitType?: UnitType;
  min?: number;
  max?: number;
  toValue?: (code: number) => number;
  toCode?: (value: number) => number;
}

/**
 * An integer code, optionally range-checked and scaled into a measured
 * value.
 */
export function numericField(definition: NumericFieldDefinition): FieldCodec<Measure> {
  const { description, width, unit, unitType } = definition;
  const toValue = definition.toValue ?? ((code: number) => code);
  const toCode = definition.toCode ?? ((value: number) => Math.round(value));
  return {
    description,
    width,
    decode(raw) {
      if (!isAvailable(raw)) {
        return null;
      }
      const code = parseCode(raw, description);
      if ((definition.min !== undefined && code < definition.min) || (definition.max !== undefined && code > definition.max)) {
        throw new InvalidCode(raw, description);
      }
      const value = toValue(code);
      return unit === undefined ? { value } : { value, unit };
    },
    encode(measure) {
      if (measure === null || measure === undefined) {
        return slashes(width);
      }
      return pad(toCode(inUnit(measure, unit, unitType)), width, description);
    },
  };
}

/** The numeric value of a measure expressed in `unit` */
export function inUnit(measure: Measure, unit: string | undefined, unitType: UnitType | undefined): number {
  if (unit === undefined || unitType === undefined || measure.unit === undefined || measure.unit === unit) {
    return measure.value;
  }
  return convert(measure.value, measure.unit, unit, unitType);
}

/**
 * A field backed by a code table. Decoded values carry `_table`, and `_code`
 * unless the table is simple; encoding re-emits a recorded `_code` as is.
 */
export function tableField<T extends object>(table: CodeTable<T>, width: number): FieldCodec<Coded<T>> {
  return {
    description: table.description,
    width,
    decode(raw) {
      if (!isAvailable(raw)) {
        return null;
      }
      const decoded: Coded<T> = { ...table.decode(raw), _table: table.id };
      if (!table.simple) {
        decoded._code = parseInt(raw, 10);
      }
      return decoded;
    },
    encode(value, options = {}) {
      if (value === null || value === undefined) {
        return slashes(width);
      }
      const code = value._code ?? table.encode(value, { use90: options.use90 });
      return pad(code, width, table.description);
    },
  };
}

/**
 * Temperature as a sign figure (0 positive, 1 negative) and a magnitude in
 * tenths of a degree. An unknown sign makes the whole field unavailable.
 */
export function signedTemperature(description: string): FieldCodec<Measure> {
  return {
    description,
    width: 4,
    decode(raw) {
      const sign = raw.slice(0, 1);
      const magnitude = raw.slice(1, 4);
      if (!isAvailable(sign) || !isAvailable(magnitude)) {
        return null;
      }
      if (sign !== '0' && sign !== '1') {
        throw new InvalidCode(sign, `sign of ${description}`);
      }
      // Whole degrees are sometimes sent with the tenths figure missing
      const tenths = parseCode(magnitude.replace(/\/$/, '0'), description);
      const value = tenths / 10;
      return { value: sign === '1' ? -value : value, unit: 'Cel' };
    },
    encode(measure) {
      if (measure === null || measure === undefined) {
        return slashes(4);
      }
      const celsius = inUnit(measure, 'Cel', 'temperature');
      const negative = celsius < 0 || Object.is(celsius, -0);
      return `${negative ? 1 : 0}${pad(Math.round(Math.abs(celsius) * 10), 3, description)}`;
    },
  };
}
