import {
  codeTable0513,
  codeTable0521,
  codeTable0833,
  codeTable0901,
  codeTable0975,
  codeTable1004,
  codeTable1677,
  codeTable167,
  codeTable168,
  codeTable1806,
  codeTable1861,
  codeTable2745,
  codeTable2754,
  codeTable2863,
  codeTable2864,
  codeTable3552,
  codeTable3570,
  codeTable3590A,
  codeTable3700,
  codeTable3764,
  codeTable3765,
  codeTable3766,
  codeTable3775,
  codeTable3776,
  codeTable3870,
  codeTable3889,
  codeTable3955,
  codeTable4077T,
  codeTable4077Z,
  codeTable4300,
  codeTable5161,
  COMPASS_POINTS,
} from '../codeTables';
import { EncodeError } from '../errors';
import {
  cloudCover,
  cloudGenus,
  direction,
  temperature,
  visibility,
  windDirection,
  windSpeed,
} from '../observations/fields';
import {
  decodeField,
  isAvailable,
  numericField,
  pad,
  slashes,
  tableField,
  type FieldCodec,
} from '../observations/Observation';
import type {
  Compass,
  DepositType,
  HighestGust,
  Measure,
  PeriodValue,
  Precipitation,
  Radiation,
  RadiationKind,
  Sunshine,
  SynopReport,
  TimePeriod,
  VisibilityDirection,
} from '../types/synop.types';
import type { GroupReader } from '../utils/groupReader';
import logger from '../utils/logger';
import type { DecodeContext, EncodeContext, GroupHandler } from './context';
import {
  decodePrecipitation,
  decodeSurfaceWind,
  encodePrecipitation,
  encodeSurfaceWind,
} from './section1';

const SUPPLEMENTARY_SPEED = /^00\d{3}$/;
const DAILY_PRECIPITATION: PeriodValue = { value: 24, unit: 'h' };
const RADIATION_KINDS: readonly RadiationKind[] = [
  'positive_net',
  'negative_net',
  'global_solar',
  'diffused_solar',
  'downward_long_wave',
  'upward_long_wave',
];
const DEPOSIT_TYPES: readonly (DepositType | null)[] = [null, null, null, 'solid', 'glaze', 'rime', 'compound', 'wet_snow'];

const groundMinimum = numericField({
  description: 'ground minimum temperature',
  width: 2,
  unit: 'Cel',
  unitType: 'temperature',
  toValue: (code) => (code <= 49 ? code : 50 - code),
  toCode: (value) => (value < 0 ? 50 - Math.round(value) : Math.round(value)),
});
const precipitationCharacter = tableField(codeTable167, 1);
const precipitationTimeRegionI = tableField(codeTable168, 1);
const groundState = tableField(codeTable0901, 1);
const groundStateSnow = tableField(codeTable0975, 1);
const snowDepth = tableField(codeTable3889, 3);
const wholeDegrees = numericField({ description: 'ground temperature', width: 2, unit: 'Cel', unitType: 'temperature' });
const evaporation = numericField({
  description: 'amount of evaporation or evapotranspiration',
  width: 3,
  unit: 'mm',
  unitType: 'length',
  toValue: (tenths) => tenths / 10,
  toCode: (value) => Math.round(value * 10),
});
const evaporationType = tableField(codeTable1806, 1);
const hoursBefore = numericField({ description: 'time of temperature change', width: 1, unit: 'h', unitType: 'time' });
const temperatureDelta = numericField({ description: 'amount of temperature change', width: 1, unit: 'Cel' });
const dailySunshine = numericField({
  description: 'amount of sunshine',
  width: 3,
  unit: 'h',
  unitType: 'time',
  toValue: (tenths) => tenths / 10,
  toCode: (value) => Math.round(value * 10),
});
const hourlySunshine = numericField({
  description: 'amount of sunshine',
  width: 2,
  unit: 'h',
  unitType: 'time',
  max: 10,
  toValue: (tenths) => tenths / 10,
  toCode: (value) => Math.round(value * 10),
});
const dailyRadiation = numericField({ description: 'amount of radiation', width: 4, unit: 'J/cm2' });
const hourlyRadiation = numericField({ description: 'amount of radiation', width: 4, unit: 'kJ/m2' });
const cloudElevation = tableField(codeTable1004, 1);
const pressureChange = numericField({
  description: 'change of surface pressure over the last 24 hours',
  width: 3,
  unit: 'hPa',
  unitType: 'pressure',
  toValue: (tenths) => tenths / 10,
  toCode: (value) => Math.round(Math.abs(value) * 10),
});
const dailyAmount = tableField(codeTable3590A, 4);
const cloudHeight = tableField(codeTable1677, 2);

const variableLocationIntensity = tableField(codeTable4077Z, 2);
const timeOfEnding = tableField(codeTable4077T, 2);
const precipitationBegan = tableField(codeTable3552, 1);
const precipitationDuration = tableField(codeTable0833, 1);
const gustSpeed = windSpeed(2);
const seaState = tableField(codeTable3700, 1);
const seawardVisibility = tableField(codeTable4300, 1);
const frozenDeposit = tableField(codeTable3764, 1);
const depositVariation = tableField(codeTable3955, 1);
const snowCover = tableField(codeTable3765, 1);
const snowRegularity = tableField(codeTable3775, 1);
const driftSnow = tableField(codeTable3766, 1);
const driftEvolution = tableField(codeTable3776, 1);
const snowFall = tableField(codeTable3870, 2);
const depositDiameter = tableField(codeTable3570, 2);
const cloudEvolution = tableField(codeTable2863, 1);
const lowCloudType = tableField(codeTable0513, 1);
const mountainCloud = tableField(codeTable2745, 1);
const valleyCloud = tableField(codeTable2754, 1);
const valleyEvolution = tableField(codeTable2864, 1);
const opticalPhenomenon = tableField(codeTable5161, 1);
const intensity = tableField(codeTable1861, 1);
const mirageType = numericField({ description: 'type of mirage', width: 1, min: 0, max: 8 });
const condensationTrail = numericField({ description: 'condensation trails', width: 1, min: 5, max: 9 });
const commencement = numericField({ description: 'time of commencement of a phenomenon', width: 1, min: 0, max: 9 });
const specialCloud = tableField(codeTable0521, 1);
const darkness = numericField({ description: 'day darkness', width: 1, min: 0, max: 2 });
const suddenTemperature = numericField({ description: 'sudden change of air temperature', width: 2, unit: 'Cel' });
const suddenHumidity = numericField({ description: 'sudden change of relative humidity', width: 2, unit: '%' });

const NINE_GROUP = /^9\d{2}[\d/]{2}$/;

/** 9-groups stored in a single report field, by their first three figures */
const SINGLE_9_GROUPS: Readonly<Record<string, keyof SynopReport>> = {
  '900': 'variable_location_intensity',
  '902': 'time_of_ending',
  '909': 'precipitation_time',
  '924': 'sea_state',
  '927': 'frozen_deposit',
  '928': 'snow_cover_regularity',
  '929': 'drift_snow',
  '931': 'snow_fall',
  '933': 'deposit_diameter',
  '934': 'deposit_diameter',
  '935': 'deposit_diameter',
  '936': 'deposit_diameter',
  '937': 'deposit_diameter',
  '940': 'cloud_evolution',
  '944': 'max_low_cloud_concentration',
  '950': 'mountain_conditions',
  '951': 'valley_clouds',
  '990': 'optical_phenomena',
  '991': 'mirage',
  '992': 'condensation_trails',
  '993': 'special_clouds',
  '994': 'day_darkness',
  '996': 'sudden_temperature_change',
  '997': 'sudden_temperature_change',
  '998': 'sudden_humidity_change',
  '999': 'sudden_humidity_change',
};

/** A 907tt period, kept without provenance so it can be compared */
const timePeriod: FieldCodec<PeriodValue> = {
  description: codeTable4077T.description,
  width: 2,
  decode(raw) {
    return isAvailable(raw) ? codeTable4077T.decode(raw) : null;
  },
  encode(value) {
    return value ? pad(codeTable4077T.encode(value), 2, codeTable4077T.description) : slashes(2);
  },
};

export function samePeriod(a: PeriodValue | null | undefined, b: PeriodValue | null | undefined): boolean {
  if (!a || !b) {
    return a === b;
  }
  return a.unit === b.unit
    && a.value === b.value
    && a.min === b.min
    && a.max === b.max
    && (a.quantifier ?? null) === (b.quantifier ?? null)
    && (a.unknown ?? false) === (b.unknown ?? false);
}

function notImplemented(group: string, context: DecodeContext, reason: string): void {
  logger.warn(`${group} not decoded: ${reason}`);
  context.notImplemented.push(group);
}

// --- Headers 0-4 ---

const decodeRegionalGroup: GroupHandler = (group, reader, report, context) => {
  if (context.region === 'I') {
    report.ground_minimum_temperature = decodeField(groundMinimum, group.slice(1, 3));
    report.local_precipitation = {
      character: decodeField(precipitationCharacter, group.slice(3, 4)),
      time: decodeField(precipitationTimeRegionI, group.slice(4, 5)),
    };
  } else if (context.region === 'Antarctic') {
    report.max_wind = decodeSurfaceWind(group.slice(1, 5), reader, context);
  } else {
    notImplemented(group, context, `group 0 is not defined for region ${context.region ?? 'unknown'}`);
  }
};

const decodeMaximumTemperature: GroupHandler = (group, _reader, report) => {
  report.maximum_temperature = decodeField(temperature, group.slice(1, 5));
};

const decodeMinimumTemperature: GroupHandler = (group, _reader, report) => {
  report.minimum_temperature = decodeField(temperature, group.slice(1, 5));
};

function decodeGroundTemperature(sign: string, degrees: string): Measure | null {
  const magnitude = decodeField(wholeDegrees, degrees);
  if (magnitude === null || (sign !== '0' && sign !== '1')) {
    return null;
  }
  return sign === '1' ? { ...magnitude, value: -magnitude.value } : magnitude;
}

const decodeGroundState: GroupHandler = (group, _reader, report, context) => {
  if (context.stationType === 'BBXX') {
    notImplemented(group, context, 'ground state is not reported by sea stations');
    return;
  }
  report.ground_state = {
    state: decodeField(groundState, group.slice(1, 2)),
    temperature: decodeGroundTemperature(group.slice(2, 3), group.slice(3, 5)),
  };
};

const decodeGroundStateSnow: GroupHandler = (group, _reader, report, context) => {
  if (context.stationType === 'BBXX') {
    notImplemented(group, context, 'ground state is not reported by sea stations');
    return;
  }
  report.ground_state_snow = {
    state: decodeField(groundStateSnow, group.slice(1, 2)),
    depth: decodeField(snowDepth, group.slice(2, 5)),
  };
};

// --- Header 5 ---

function decodeSunshine(group: string): Sunshine | null {
  const duration = group.slice(2, 3);
  if (duration === '3') {
    return { amount: decodeField(hourlySunshine, group.slice(3, 5)), duration: { value: 1, unit: 'h' } };
  }
  return { amount: decodeField(dailySunshine, group.slice(2, 5)), duration: { value: 24, unit: 'h' } };
}

/**
 * Radiation groups `jFFFF` following a sunshine group, in increasing order
 * of `j`. Returns the decoded entries and the groups they came from.
 */
function decodeRadiation(reader: GroupReader, sunshine: Sunshine | null): [Radiation[], string[]] {
  const hourly = sunshine?.duration.value === 1;
  const amount = hourly ? hourlyRadiation : dailyRadiation;
  const radiation: Radiation[] = [];
  const groups: string[] = [];
  let last = -1;
  for (let next = reader.peek(); next !== undefined && /^[0-5][\d/]{4}$/.test(next); next = reader.peek()) {
    const j = parseInt(next.slice(0, 1), 10);
    if (j <= last || (j === 5 && !/^5[0-4]/.test(next))) {
      break;
    }
    reader.next();
    last = j;
    groups.push(next);
    radiation.push({
      kind: RADIATION_KINDS[j],
      amount: decodeField(amount, next.slice(1, 5)),
      time_before_obs: { value: hourly ? 1 : 24, unit: 'h' },
    });
  }
  return [radiation, groups];
}

const decodeGroup5: GroupHandler = (group, reader, report, context) => {
  const kind = group.slice(1, 2);
  switch (kind) {
    case '0':
    case '1':
    case '2':
    case '3':
      report.evapotranspiration = {
        amount: decodeField(evaporation, group.slice(1, 4)),
        type: decodeField(evaporationType, group.slice(4, 5)),
      };
      return;
    case '4': {
      const change = decodeField(temperatureDelta, group.slice(4, 5));
      const sign = group.slice(3, 4);
      report.temperature_change = {
        time_before_obs: decodeField(hoursBefore, group.slice(2, 3)),
        change: change && sign === '1' ? { ...change, value: -change.value } : change,
      };
      return;
    }
    case '5': {
      if (!/^[0-3/]$/.test(group.slice(2, 3))) {
        notImplemented(group, context, 'unknown sunshine group');
        return;
      }
      const sunshine = group.slice(2, 5) === '///' ? null : decodeSunshine(group);
      const [radiation, radiationGroups] = decodeRadiation(reader, sunshine);
      if (report.sunshine !== undefined) {
        notImplemented(group, context, 'only one sunshine group is decoded');
        context.notImplemented.push(...radiationGroups);
        return;
      }
      report.sunshine = sunshine;
      if (radiation.length > 0) {
        report.radiation = radiation;
      }
      return;
    }
    case '6':
      report.cloud_drift_direction = {
        low: decodeField(direction, group.slice(2, 3)),
        middle: decodeField(direction, group.slice(3, 4)),
        high: decodeField(direction, group.slice(4, 5)),
      };
      return;
    case '7':
      report.cloud_elevation = {
        genus: decodeField(cloudGenus, group.slice(2, 3)),
        direction: decodeField(direction, group.slice(3, 4)),
        elevation: decodeField(cloudElevation, group.slice(4, 5)),
      };
      return;
    case '8':
    case '9': {
      const change = decodeField(pressureChange, group.slice(2, 5));
      report.pressure_change = change && kind === '9' ? { ...change, value: -change.value } : change;
      return;
    }
    default:
      notImplemented(group, context, 'unknown group 5');
  }
};

// --- Headers 6-8 ---

const decodePrecipitationS3: GroupHandler = (group, _reader, report, context) => {
  if (report.precipitation_s3 !== undefined) {
    notImplemented(group, context, 'precipitation already reported in Section 3');
    return;
  }
  if (!context.precipitationInSection3) {
    logger.warn(`Precipitation group ${group} present although the indicator omits it from Section 3`);
  }
  report.precipitation_s3 = group.startsWith('7')
    ? { amount: decodeField(dailyAmount, group.slice(1, 5)), time_before_obs: { value: 24, unit: 'h' } }
    : decodePrecipitation(group);
};

const decodeCloudLayer: GroupHandler = (group, _reader, report) => {
  const layer = {
    cloud_cover: decodeField(cloudCover, group.slice(1, 2)),
    genus: decodeField(cloudGenus, group.slice(2, 3)),
    cloud_height: decodeField(cloudHeight, group.slice(3, 5)),
  };
  report.cloud_layer = [...(report.cloud_layer ?? []), layer];
};

// --- Header 9 ---

function decodeGust(group: string, reader: GroupReader, context: DecodeContext): HighestGust {
  const ff = group.slice(3, 5);
  let speed = decodeField(gustSpeed, ff, { windUnit: context.windUnit });
  const next = reader.peek();
  if (ff === '99' && next !== undefined && SUPPLEMENTARY_SPEED.test(next)) {
    reader.next();
    speed = decodeField(windSpeed(3), next.slice(2, 5), { windUnit: context.windUnit });
  }
  const gust: HighestGust = { speed };
  if (group.startsWith('910')) {
    gust.measure_period = { value: 10, unit: 'min' };
  } else if (context.timeBefore !== null) {
    gust.time_before_obs = { ...context.timeBefore };
  }
  return gust;
}

function visibilityDirection(group: string): VisibilityDirection {
  const code = parseInt(group.slice(2, 3), 10);
  const compass: Compass | 'towardsSea' = COMPASS_POINTS[code] ?? 'towardsSea';
  return {
    direction: { value: compass, _table: '0700', _code: code },
    visibility: decodeField(visibility, group.slice(3, 5)),
  };
}

const decodeGroup9: GroupHandler = (group, reader, report, context) => {
  const code = group.slice(0, 3);
  const payload = group.slice(3, 5);
  const [first, second] = [payload.slice(0, 1), payload.slice(1, 2)];
  const key = SINGLE_9_GROUPS[code];
  if (key !== undefined && report[key] !== undefined) {
    notImplemented(group, context, `${key} already reported`);
    return;
  }
  switch (code) {
    case '900':
      report.variable_location_intensity = decodeField(variableLocationIntensity, payload);
      return;
    case '902':
      report.time_of_ending = decodeField(timeOfEnding, payload);
      return;
    case '907': {
      const period = decodeField(timePeriod, payload);
      const next = reader.peek();
      context.timeBefore = period;
      report.time_periods = [...(report.time_periods ?? []), {
        period,
        followed_by: next !== undefined && NINE_GROUP.test(next) ? next.slice(0, 3) : null,
      }];
      return;
    }
    case '909':
      report.precipitation_time = {
        time: decodeField(precipitationBegan, first),
        duration: decodeField(precipitationDuration, second),
      };
      return;
    case '910':
    case '911':
      report.highest_gust = [...(report.highest_gust ?? []), decodeGust(group, reader, context)];
      return;
    case '915': {
      const gust = report.highest_gust?.[report.highest_gust.length - 1];
      if (gust === undefined || gust.direction !== undefined) {
        notImplemented(group, context, 'gust direction without a gust');
        return;
      }
      gust.direction = decodeField(windDirection, payload);
      return;
    }
    case '924':
      report.sea_state = {
        state: decodeField(seaState, first),
        visibility: decodeField(seawardVisibility, second),
      };
      return;
    case '927':
      report.frozen_deposit = {
        deposit: decodeField(frozenDeposit, first),
        variation: decodeField(depositVariation, second),
      };
      return;
    case '928':
      report.snow_cover_regularity = {
        cover: decodeField(snowCover, first),
        regularity: decodeField(snowRegularity, second),
      };
      return;
    case '929':
      report.drift_snow = {
        phenomena: decodeField(driftSnow, first),
        evolution: decodeField(driftEvolution, second),
      };
      return;
    case '931':
      report.snow_fall = context.timeBefore === null
        ? { amount: decodeField(snowFall, payload) }
        : { amount: decodeField(snowFall, payload), time_before_obs: { ...context.timeBefore } };
      return;
    case '933':
    case '934':
    case '935':
    case '936':
    case '937': {
      const depositType = DEPOSIT_TYPES[parseInt(code.slice(2, 3), 10)];
      if (depositType === undefined || depositType === null) {
        notImplemented(group, context, 'unknown deposit type');
        return;
      }
      report.deposit_diameter = { deposit_type: depositType, diameter: decodeField(depositDiameter, payload) };
      return;
    }
    case '940':
      report.cloud_evolution = {
        genus: decodeField(cloudGenus, first),
        evolution: decodeField(cloudEvolution, second),
      };
      return;
    case '944':
      report.max_low_cloud_concentration = {
        phenomenon: decodeField(lowCloudType, first),
        direction: decodeField(direction, second),
      };
      return;
    case '950':
      report.mountain_conditions = {
        conditions: decodeField(mountainCloud, first),
        evolution: decodeField(cloudEvolution, second),
      };
      return;
    case '951':
      report.valley_clouds = {
        cover: decodeField(valleyCloud, first),
        evolution: decodeField(valleyEvolution, second),
      };
      return;
    case '990':
      report.optical_phenomena = {
        phenomena: decodeField(opticalPhenomenon, first),
        intensity: decodeField(intensity, second),
      };
      return;
    case '991':
      report.mirage = {
        phenomenon: decodeField(mirageType, first),
        direction: decodeField(direction, second),
      };
      return;
    case '992':
      report.condensation_trails = {
        trail: decodeField(condensationTrail, first),
        time: decodeField(commencement, second),
      };
      return;
    case '993':
      report.special_clouds = {
        phenomenon: decodeField(specialCloud, first),
        direction: decodeField(direction, second),
      };
      return;
    case '994':
      report.day_darkness = {
        phenomenon: decodeField(darkness, first),
        direction: decodeField(direction, second),
      };
      return;
    case '996':
    case '997': {
      const change = decodeField(suddenTemperature, payload);
      report.sudden_temperature_change = change && code === '997' ? { ...change, value: -change.value } : change;
      return;
    }
    case '998':
    case '999': {
      const change = decodeField(suddenHumidity, payload);
      report.sudden_humidity_change = change && code === '999' ? { ...change, value: -change.value } : change;
      return;
    }
    default:
      if (/^98[0-8]$/.test(code)) {
        report.visibility_direction = [...(report.visibility_direction ?? []), visibilityDirection(group)];
        return;
      }
      notImplemented(group, context, `group ${code} is not supported`);
  }
};

export const section3Handlers: Readonly<Record<number, GroupHandler>> = {
  0: decodeRegionalGroup,
  1: decodeMaximumTemperature,
  2: decodeMinimumTemperature,
  3: decodeGroundState,
  4: decodeGroundStateSnow,
  5: decodeGroup5,
  6: decodePrecipitationS3,
  7: decodePrecipitationS3,
  8: decodeCloudLayer,
  9: decodeGroup9,
};

/** Headers that may appear more than once in Section 3 */
export const SECTION3_REPEATABLE: ReadonlySet<number> = new Set([5, 8, 9]);

// --- Encoding ---

const SECTION3_KEYS: readonly (keyof SynopReport)[] = [
  'ground_minimum_temperature', 'local_precipitation', 'max_wind', 'maximum_temperature', 'minimum_temperature',
  'ground_state', 'ground_state_snow', 'evapotranspiration', 'temperature_change', 'sunshine', 'radiation',
  'cloud_drift_direction', 'cloud_elevation', 'pressure_change', 'precipitation_s3', 'cloud_layer',
  'variable_location_intensity', 'time_of_ending', 'time_periods', 'precipitation_time', 'highest_gust', 'sea_state',
  'frozen_deposit', 'snow_cover_regularity', 'drift_snow', 'snow_fall', 'deposit_diameter', 'cloud_evolution',
  'max_low_cloud_concentration', 'mountain_conditions', 'valley_clouds', 'visibility_direction',
  'optical_phenomena', 'mirage', 'condensation_trails', 'special_clouds', 'day_darkness',
  'sudden_temperature_change', 'sudden_humidity_change',
];

export function hasSection3(report: SynopReport): boolean {
  return SECTION3_KEYS.some((key) => report[key] !== undefined);
}

function signed(header: string, negativeHeader: string, codec: FieldCodec<Measure>, measure: Measure | null): string {
  if (measure === null) {
    return `${header}${codec.encode(null)}`;
  }
  const negative = measure.value < 0;
  return `${negative ? negativeHeader : header}${codec.encode({ ...measure, value: Math.abs(measure.value) })}`;
}

function encodeGroundTemperature(measure: Measure | null): string {
  if (measure === null) {
    return '///';
  }
  return `${measure.value < 0 ? 1 : 0}${wholeDegrees.encode({ ...measure, value: Math.abs(measure.value) })}`;
}

function encodeRegionalGroup(report: SynopReport, context: EncodeContext): string[] {
  if (report.ground_minimum_temperature !== undefined || report.local_precipitation !== undefined) {
    const character = precipitationCharacter.encode(report.local_precipitation?.character);
    const time = precipitationTimeRegionI.encode(report.local_precipitation?.time);
    return [`0${groundMinimum.encode(report.ground_minimum_temperature)}${character}${time}`];
  }
  if (report.max_wind !== undefined) {
    const [ddff, ...continuation] = encodeSurfaceWind(report.max_wind, context);
    return [`0${ddff}`, ...continuation];
  }
  return [];
}

function encodeSunshine(sunshine: Sunshine | null | undefined): string {
  if (!sunshine) {
    return '55///';
  }
  if (sunshine.duration.value === 1) {
    return `553${hourlySunshine.encode(sunshine.amount)}`;
  }
  return `55${dailySunshine.encode(sunshine.amount)}`;
}

function encodeGroup5(report: SynopReport): string[] {
  const groups: string[] = [];
  const { evapotranspiration, temperature_change: change } = report;
  if (evapotranspiration !== undefined) {
    groups.push(`5${evaporation.encode(evapotranspiration.amount)}${evaporationType.encode(evapotranspiration.type)}`);
  }
  if (change !== undefined) {
    const delta = change.change;
    const sign = delta === null ? '/' : String(delta.value < 0 ? 1 : 0);
    const magnitude = delta === null ? null : { ...delta, value: Math.abs(delta.value) };
    groups.push(`54${hoursBefore.encode(change.time_before_obs)}${sign}${temperatureDelta.encode(magnitude)}`);
  }
  if (report.sunshine !== undefined || report.radiation !== undefined) {
    groups.push(encodeSunshine(report.sunshine));
    const hourly = report.sunshine?.duration.value === 1;
    for (const entry of report.radiation ?? []) {
      const amount = hourly ? hourlyRadiation : dailyRadiation;
      groups.push(`${RADIATION_KINDS.indexOf(entry.kind)}${amount.encode(entry.amount)}`);
    }
  }
  const drift = report.cloud_drift_direction;
  if (drift !== undefined) {
    groups.push(`56${direction.encode(drift.low)}${direction.encode(drift.middle)}${direction.encode(drift.high)}`);
  }
  const elevation = report.cloud_elevation;
  if (elevation !== undefined) {
    groups.push(`57${cloudGenus.encode(elevation.genus)}${direction.encode(elevation.direction)}${cloudElevation.encode(elevation.elevation)}`);
  }
  if (report.pressure_change !== undefined) {
    groups.push(signed('58', '59', pressureChange, report.pressure_change));
  }
  return groups;
}

function encodePrecipitationS3(precipitation: Precipitation): string {
  const period = precipitation.time_before_obs;
  if (period !== null && period._table === undefined && samePeriod(period, DAILY_PRECIPITATION)) {
    return `7${dailyAmount.encode(precipitation.amount)}`;
  }
  return encodePrecipitation('6', precipitation);
}

/** Emits `907tt` when `period` differs from the period currently in force */
function timeBeforeGroup(period: PeriodValue | undefined, context: EncodeContext): string[] {
  if (period === undefined || samePeriod(period, context.timeBefore)) {
    return [];
  }
  context.timeBefore = period;
  return [`907${timePeriod.encode(period)}`];
}

type PeriodGroup = (period: PeriodValue | undefined) => string[];

/**
 * Puts each recorded `907tt` back in front of the 9-group that followed it.
 * A period followed by another 907 goes with the next one; one that ended
 * the section, or whose group is no longer sent, goes last.
 */
export function placeTimePeriods(groups: string[], periods: TimePeriod[]): string[] {
  const output = [...groups];
  let cursor = 0;
  let pending: string[] = [];
  for (const entry of periods) {
    pending.push(`907${timePeriod.encode(entry.period)}`);
    const code = entry.followed_by;
    if (code === '907') {
      continue;
    }
    const found = code === null ? -1 : output.findIndex((group, index) => index >= cursor && group.startsWith(code));
    const index = found < 0 ? output.length : found;
    output.splice(index, 0, ...pending);
    cursor = index + pending.length + 1;
    pending = [];
  }
  output.push(...pending);
  return output;
}

function encodeGusts(gusts: HighestGust[], context: EncodeContext, periodGroup: PeriodGroup): string[] {
  const groups: string[] = [];
  for (const gust of gusts) {
    let header = '911';
    if (gust.measure_period !== undefined) {
      if (gust.measure_period.value !== 10 || gust.measure_period.unit !== 'min') {
        throw new EncodeError('highest gust measure_period must be 10 min');
      }
      header = '910';
    } else {
      groups.push(...periodGroup(gust.time_before_obs));
    }
    const [ff, ...continuation] = encodeSurfaceWind({ direction: null, speed: gust.speed }, context);
    groups.push(`${header}${ff.slice(2, 4)}`, ...continuation);
    if (gust.direction !== undefined) {
      groups.push(`915${windDirection.encode(gust.direction)}`);
    }
  }
  return groups;
}

function pair(code: string, first: string, second: string): string {
  return `${code}${first}${second}`;
}

function encodeGroup9(report: SynopReport, context: EncodeContext): string[] {
  const recorded = report.time_periods;
  // Recorded 907 groups are placed afterwards instead of derived from each group's period
  const periodGroup: PeriodGroup = (period) => (recorded === undefined ? timeBeforeGroup(period, context) : []);
  const groups: string[] = [];
  if (report.variable_location_intensity !== undefined) {
    groups.push(`900${variableLocationIntensity.encode(report.variable_location_intensity)}`);
  }
  if (report.time_of_ending !== undefined) {
    groups.push(`902${timeOfEnding.encode(report.time_of_ending)}`);
  }
  const { precipitation_time: precipitationTime } = report;
  if (precipitationTime !== undefined) {
    groups.push(pair('909', precipitationBegan.encode(precipitationTime.time), precipitationDuration.encode(precipitationTime.duration)));
  }
  if (report.highest_gust !== undefined) {
    groups.push(...encodeGusts(report.highest_gust, context, periodGroup));
  }
  if (report.sea_state !== undefined) {
    groups.push(pair('924', seaState.encode(report.sea_state.state), seawardVisibility.encode(report.sea_state.visibility)));
  }
  if (report.frozen_deposit !== undefined) {
    groups.push(pair('927', frozenDeposit.encode(report.frozen_deposit.deposit), depositVariation.encode(report.frozen_deposit.variation)));
  }
  if (report.snow_cover_regularity !== undefined) {
    const { cover, regularity } = report.snow_cover_regularity;
    groups.push(pair('928', snowCover.encode(cover), snowRegularity.encode(regularity)));
  }
  if (report.drift_snow !== undefined) {
    groups.push(pair('929', driftSnow.encode(report.drift_snow.phenomena), driftEvolution.encode(report.drift_snow.evolution)));
  }
  if (report.snow_fall !== undefined) {
    groups.push(...periodGroup(report.snow_fall.time_before_obs));
    groups.push(`931${snowFall.encode(report.snow_fall.amount)}`);
  }
  if (report.deposit_diameter !== undefined) {
    const type = DEPOSIT_TYPES.indexOf(report.deposit_diameter.deposit_type);
    groups.push(`93${type}${depositDiameter.encode(report.deposit_diameter.diameter)}`);
  }
  if (report.cloud_evolution !== undefined) {
    groups.push(pair('940', cloudGenus.encode(report.cloud_evolution.genus), cloudEvolution.encode(report.cloud_evolution.evolution)));
  }
  const concentration = report.max_low_cloud_concentration;
  if (concentration !== undefined) {
    groups.push(pair('944', lowCloudType.encode(concentration.phenomenon), direction.encode(concentration.direction)));
  }
  const mountain = report.mountain_conditions;
  if (mountain !== undefined) {
    groups.push(pair('950', mountainCloud.encode(mountain.conditions), cloudEvolution.encode(mountain.evolution)));
  }
  if (report.valley_clouds !== undefined) {
    groups.push(pair('951', valleyCloud.encode(report.valley_clouds.cover), valleyEvolution.encode(report.valley_clouds.evolution)));
  }
  for (const entry of report.visibility_direction ?? []) {
    const code = entry.direction._code ?? Math.max(0, COMPASS_POINTS.indexOf(entry.direction.value === 'towardsSea' ? null : entry.direction.value));
    groups.push(`98${code}${visibility.encode(entry.visibility, { use90: context.useVisibility90 })}`);
  }
  const optical = report.optical_phenomena;
  if (optical !== undefined) {
    groups.push(pair('990', opticalPhenomenon.encode(optical.phenomena), intensity.encode(optical.intensity)));
  }
  if (report.mirage !== undefined) {
    groups.push(pair('991', mirageType.encode(report.mirage.phenomenon), direction.encode(report.mirage.direction)));
  }
  const trails = report.condensation_trails;
  if (trails !== undefined) {
    groups.push(pair('992', condensationTrail.encode(trails.trail), commencement.encode(trails.time)));
  }
  if (report.special_clouds !== undefined) {
    groups.push(pair('993', specialCloud.encode(report.special_clouds.phenomenon), direction.encode(report.special_clouds.direction)));
  }
  if (report.day_darkness !== undefined) {
    groups.push(pair('994', darkness.encode(report.day_darkness.phenomenon), direction.encode(report.day_darkness.direction)));
  }
  if (report.sudden_temperature_change !== undefined) {
    groups.push(signed('996', '997', suddenTemperature, report.sudden_temperature_change));
  }
  if (report.sudden_humidity_change !== undefined) {
    groups.push(signed('998', '999', suddenHumidity, report.sudden_humidity_change));
  }
  return recorded === undefined ? groups : placeTimePeriods(groups, recorded);
}

export function encodeSection3(report: SynopReport, context: EncodeContext): string[] {
  const groups: string[] = ['333', ...encodeRegionalGroup(report, context)];
  if (report.maximum_temperature !== undefined) {
    groups.push(`1${temperature.encode(report.maximum_temperature)}`);
  }
  if (report.minimum_temperature !== undefined) {
    groups.push(`2${temperature.encode(report.minimum_temperature)}`);
  }
  if (report.ground_state !== undefined) {
    groups.push(`3${groundState.encode(report.ground_state.state)}${encodeGroundTemperature(report.ground_state.temperature)}`);
  }
  if (report.ground_state_snow !== undefined) {
    const { state, depth } = report.ground_state_snow;
    groups.push(`4${groundStateSnow.encode(state)}${snowDepth.encode(depth)}`);
  }
  groups.push(...encodeGroup5(report));
  if (report.precipitation_s3 !== undefined) {
    groups.push(encodePrecipitationS3(report.precipitation_s3));
  }
  for (const layer of report.cloud_layer ?? []) {
    const height = cloudHeight.encode(layer.cloud_height, { use90: context.useCloudHeight90 });
    groups.push(`8${cloudCover.encode(layer.cloud_cover)}${cloudGenus.encode(layer.genus)}${height}`);
  }
  groups.push(...encodeGroup9(report, context));
  return groups;
}
