import {
  codeTable0200,
  codeTable0264,
  codeTable0509,
  codeTable0513,
  codeTable0515,
  codeTable1600,
  codeTable4531,
  codeTable4561,
  codeTable4677,
  codeTable4680,
} from '../codeTables';
import { DecodeError, EncodeError } from '../errors';
import {
  clockField,
  cloudCover,
  precipitationAmount,
  precipitationPeriod,
  pressure,
  temperature,
  visibility,
  windDirection,
  windSpeed,
} from '../observations/fields';
import {
  decodeField,
  inUnit,
  isAvailable,
  numericField,
  pad,
  slashes,
  tableField,
} from '../observations/Observation';
import type {
  CloudTypes,
  Geopotential,
  Measure,
  Precipitation,
  PressureTendency,
  SurfaceWind,
  SynopReport,
} from '../types/synop.types';
import type { GroupReader } from '../utils/groupReader';
import logger from '../utils/logger';
import type { DecodeContext, EncodeContext, GroupHandler } from './context';

const GROUP_PATTERN = /^[\d/]{5}$/;
const SUPPLEMENTARY_SPEED = /^00\d{3}$/;

const lowestCloudBase = tableField(codeTable1600, 1);
const speed = windSpeed(2);
const relativeHumidity = numericField({
  description: 'relative humidity', width: 3, unit: '%', min: 0, max: 100,
});
const isobaricSurface = tableField(codeTable0264, 1);
const tendency = tableField(codeTable0200, 1);
const tendencyChange = numericField({
  description: 'amount of pressure tendency',
  width: 3,
  unit: 'hPa',
  unitType: 'pressure',
  toValue: (tenths) => tenths / 10,
  toCode: (value) => Math.round(Math.abs(value) * 10),
});
const lowCloudType = tableField(codeTable0513, 1);
const middleCloudType = tableField(codeTable0515, 1);
const highCloudType = tableField(codeTable0509, 1);
const cloudAmount = numericField({
  description: 'amount of low or middle cloud', width: 1, unit: 'okta', min: 0, max: 9,
});
const hour = clockField('hour of observation', 24);
const minute = clockField('minute of observation', 59);
const height = numericField({ description: 'geopotential height', width: 3, unit: 'gpm' });

/** Adds the thousands omitted from a geopotential height on each standard surface */
function geopotentialHeight(surfaceCode: number, hhh: number): number {
  switch (surfaceCode) {
    case 2:
      return hhh < 300 ? hhh + 1000 : hhh;
    case 5:
      return hhh + 5000;
    case 7:
      return hhh < 500 ? hhh + 3000 : hhh + 2000;
    case 8:
      return hhh + 1000;
    default:
      return hhh;
  }
}

function geopotentialCode(surfaceCode: number, gpm: number): number {
  switch (surfaceCode) {
    case 2:
      return gpm >= 1000 ? gpm - 1000 : gpm;
    case 5:
      return gpm - 5000;
    case 7:
      return gpm >= 3000 ? gpm - 3000 : gpm - 2000;
    case 8:
      return gpm - 1000;
    default:
      return gpm;
  }
}

function decodeIndicators(group: string, report: SynopReport, context: DecodeContext): void {
  if (!GROUP_PATTERN.test(group)) {
    throw new DecodeError(`${group} is not a valid iRixhVV group`);
  }
  const iR = group.slice(0, 1);
  const ix = group.slice(1, 2);
  report.precipitation_indicator = null;
  if (isAvailable(iR)) {
    const value = parseInt(iR, 10);
    if (value <= 4) {
      report.precipitation_indicator = {
        value,
        in_group_1: value === 0 || value === 1,
        in_group_3: value === 0 || value === 2,
      };
      context.precipitationInSection1 = report.precipitation_indicator.in_group_1;
      context.precipitationInSection3 = report.precipitation_indicator.in_group_3;
    } else {
      logger.warn(`${iR} is not a valid code for precipitation indicator`);
    }
  }
  report.weather_indicator = null;
  if (isAvailable(ix)) {
    const value = parseInt(ix, 10);
    if (value >= 1 && value <= 7) {
      report.weather_indicator = { value, automatic: value >= 4 };
      context.automaticStation = value >= 4;
    } else {
      logger.warn(`${ix} is not a valid code for weather indicator`);
    }
  }
  report.lowest_cloud_base = decodeField(lowestCloudBase, group.slice(2, 3));
  report.visibility = decodeField(visibility, group.slice(3, 5));
}

function decodeWind(group: string, reader: GroupReader, report: SynopReport, context: DecodeContext): void {
  if (!GROUP_PATTERN.test(group)) {
    throw new DecodeError(`${group} is not a valid Nddff group`);
  }
  report.cloud_cover = decodeField(cloudCover, group.slice(0, 1));
  report.surface_wind = decodeSurfaceWind(group.slice(1, 5), reader, context);
}

/**
 * Direction and speed from `ddff`. A speed of 99 is continued in a following
 * 00fff group when one is present.
 */
export function decodeSurfaceWind(ddff: string, reader: GroupReader, context: DecodeContext): SurfaceWind {
  const direction = decodeField(windDirection, ddff.slice(0, 2));
  const ff = ddff.slice(2, 4);
  let windSpeedValue = decodeField(speed, ff, { windUnit: context.windUnit });
  const next = reader.peek();
  if (ff === '99' && next !== undefined && SUPPLEMENTARY_SPEED.test(next)) {
    reader.next();
    windSpeedValue = decodeField(windSpeed(3), next.slice(2, 5), { windUnit: context.windUnit });
  }
  if (direction?.calm && windSpeedValue !== null && windSpeedValue.value > 0) {
    logger.warn(`Wind direction ${ddff.slice(0, 2)} is calm but speed is ${windSpeedValue.value}`);
    windSpeedValue = null;
  }
  return { direction, speed: windSpeedValue };
}

const decodeTemperatureGroup: GroupHandler = (group, _reader, report) => {
  report.air_temperature = decodeField(temperature, group.slice(1, 5));
};

const decodeHumidityGroup: GroupHandler = (group, _reader, report) => {
  if (group.slice(1, 2) === '9') {
    report.relative_humidity = decodeField(relativeHumidity, group.slice(2, 5));
  } else {
    report.dewpoint_temperature = decodeField(temperature, group.slice(1, 5));
  }
};

const decodeStationPressure: GroupHandler = (group, _reader, report) => {
  report.station_pressure = decodeField(pressure, group.slice(1, 5));
};

const decodeSeaLevelPressure: GroupHandler = (group, _reader, report) => {
  const a = group.slice(1, 2);
  if (a === '0' || a === '9' || a === '/') {
    report.sea_level_pressure = decodeField(pressure, group.slice(1, 5));
    return;
  }
  const surface = decodeField(isobaricSurface, a);
  const hhh = decodeField(height, group.slice(2, 5));
  report.geopotential = {
    surface,
    height: hhh && surface?._code !== undefined
      ? { value: geopotentialHeight(surface._code, hhh.value), unit: 'gpm' }
      : hhh,
  };
};

const decodePressureTendency: GroupHandler = (group, _reader, report) => {
  const a = decodeField(tendency, group.slice(1, 2));
  const change = decodeField(tendencyChange, group.slice(2, 5));
  report.pressure_tendency = {
    tendency: a,
    change: change && a !== null && a.value >= 5 ? { ...change, value: -change.value } : change,
  };
};

export function decodePrecipitation(group: string): Precipitation {
  return {
    amount: decodeField(precipitationAmount, group.slice(1, 4)),
    time_before_obs: decodeField(precipitationPeriod, group.slice(4, 5)),
  };
}

const decodePrecipitationGroup: GroupHandler = (group, _reader, report, context) => {
  if (!context.precipitationInSection1) {
    logger.warn(`Precipitation group ${group} present although the indicator omits it from Section 1`);
  }
  report.precipitation_s1 = decodePrecipitation(group);
};

const decodeWeatherGroup: GroupHandler = (group, _reader, report, context) => {
  const present = tableField(context.automaticStation ? codeTable4680 : codeTable4677, 2);
  const past = tableField(context.automaticStation ? codeTable4531 : codeTable4561, 1);
  const ww = decodeField(present, group.slice(1, 3));
  report.present_weather = ww && context.defaultTimeBefore
    ? { ...ww, time_before_obs: { ...context.defaultTimeBefore } }
    : ww;
  report.past_weather = [
    decodeField(past, group.slice(3, 4)),
    decodeField(past, group.slice(4, 5)),
  ];
};

const decodeCloudTypes: GroupHandler = (group, _reader, report) => {
  const amount = decodeField(cloudAmount, group.slice(1, 2));
  const cloudTypes: CloudTypes = {
    low_cloud_type: decodeField(lowCloudType, group.slice(2, 3)),
    middle_cloud_type: decodeField(middleCloudType, group.slice(3, 4)),
    high_cloud_type: decodeField(highCloudType, group.slice(4, 5)),
  };
  // Nh is the amount of low cloud, or of middle cloud when there is none
  if (cloudTypes.low_cloud_type !== null && cloudTypes.low_cloud_type.value > 0) {
    cloudTypes.low_cloud_amount = amount;
  } else if (cloudTypes.middle_cloud_type !== null && cloudTypes.middle_cloud_type.value > 0) {
    cloudTypes.middle_cloud_amount = amount;
  } else {
    cloudTypes.cloud_amount = amount;
  }
  report.cloud_types = cloudTypes;
};

const decodeExactTime: GroupHandler = (group, _reader, report) => {
  report.exact_obs_time = {
    hour: decodeField(hour, group.slice(1, 3)),
    minute: decodeField(minute, group.slice(3, 5)),
  };
};

export const section1Handlers: Readonly<Record<number, GroupHandler>> = {
  1: decodeTemperatureGroup,
  2: decodeHumidityGroup,
  3: decodeStationPressure,
  4: decodeSeaLevelPressure,
  5: decodePressureTendency,
  6: decodePrecipitationGroup,
  7: decodeWeatherGroup,
  8: decodeCloudTypes,
  9: decodeExactTime,
};

/** Decodes the two mandatory groups; returns false when the telegram ends first */
export function decodeSection1Mandatory(reader: GroupReader, report: SynopReport, context: DecodeContext): boolean {
  const indicators = reader.next();
  if (indicators === undefined) {
    return false;
  }
  decodeIndicators(indicators, report, context);
  const wind = reader.next();
  if (wind === undefined) {
    return false;
  }
  decodeWind(wind, reader, report, context);
  return true;
}

// --- Encoding ---

function code(value: { value: number } | null | undefined): string {
  return value ? String(value.value) : '/';
}

/** `ddff` plus a 00fff continuation group when the speed does not fit two figures */
export function encodeSurfaceWind(wind: SurfaceWind | undefined, context: EncodeContext): string[] {
  const direction = windDirection.encode(wind?.direction);
  const windSpeedValue = wind?.speed;
  if (windSpeedValue === null || windSpeedValue === undefined) {
    return [`${direction}//`];
  }
  const value = Math.round(inUnit(windSpeedValue, context.windUnit, 'speed'));
  if (value > 99) {
    return [`${direction}99`, `00${pad(value, 3, 'wind speed')}`];
  }
  return [`${direction}${pad(value, 2, 'wind speed')}`];
}

function encodeGeopotential(geopotential: Geopotential): string {
  const surface = isobaricSurface.encode(geopotential.surface);
  if (!geopotential.height) {
    return `4${surface}///`;
  }
  const surfaceCode = geopotential.surface
    ? geopotential.surface._code ?? codeTable0264.encode(geopotential.surface)
    : undefined;
  const hhh = surfaceCode === undefined
    ? geopotential.height.value
    : geopotentialCode(surfaceCode, geopotential.height.value);
  return `4${surface}${pad(hhh, 3, 'geopotential height')}`;
}

function encodePressureTendency(pressureTendency: PressureTendency): string {
  return `5${tendency.encode(pressureTendency.tendency)}${tendencyChange.encode(pressureTendency.change)}`;
}

export function encodePrecipitation(header: string, precipitation: Precipitation): string {
  return `${header}${precipitationAmount.encode(precipitation.amount)}${precipitationPeriod.encode(precipitation.time_before_obs)}`;
}

function encodeCloudTypes(cloudTypes: CloudTypes): string {
  const amount: Measure | null | undefined = cloudTypes.low_cloud_amount
    ?? cloudTypes.middle_cloud_amount
    ?? cloudTypes.cloud_amount;
  return [
    '8',
    cloudAmount.encode(amount),
    lowCloudType.encode(cloudTypes.low_cloud_type),
    middleCloudType.encode(cloudTypes.middle_cloud_type),
    highCloudType.encode(cloudTypes.high_cloud_type),
  ].join('');
}

export function encodeSection1(report: SynopReport, context: EncodeContext): string[] {
  const groups: string[] = [];
  groups.push([
    code(report.precipitation_indicator),
    code(report.weather_indicator),
    lowestCloudBase.encode(report.lowest_cloud_base),
    visibility.encode(report.visibility, { use90: context.useVisibility90 }),
  ].join(''));

  const [ddff, ...continuation] = encodeSurfaceWind(report.surface_wind, context);
  groups.push(`${cloudCover.encode(report.cloud_cover)}${ddff}`, ...continuation);

  if (report.air_temperature !== undefined) {
    groups.push(`1${temperature.encode(report.air_temperature)}`);
  }
  if (report.dewpoint_temperature !== undefined) {
    groups.push(`2${temperature.encode(report.dewpoint_temperature)}`);
  } else if (report.relative_humidity !== undefined) {
    groups.push(`29${relativeHumidity.encode(report.relative_humidity)}`);
  }
  if (report.station_pressure !== undefined) {
    groups.push(`3${pressure.encode(report.station_pressure)}`);
  }
  if (report.sea_level_pressure !== undefined) {
    groups.push(`4${pressure.encode(report.sea_level_pressure)}`);
  } else if (report.geopotential !== undefined) {
    groups.push(encodeGeopotential(report.geopotential));
  }
  if (report.pressure_tendency !== undefined) {
    groups.push(encodePressureTendency(report.pressure_tendency));
  }
  if (report.precipitation_s1 !== undefined) {
    groups.push(encodePrecipitation('6', report.precipitation_s1));
  }
  if (report.present_weather !== undefined || report.past_weather !== undefined) {
    const [w1, w2] = report.past_weather ?? [null, null];
    const ww = report.present_weather ? pad(report.present_weather.value, 2, 'present weather') : slashes(2);
    groups.push(`7${ww}${code(w1)}${code(w2)}`);
  }
  if (report.cloud_types !== undefined) {
    groups.push(encodeCloudTypes(report.cloud_types));
  }
  if (report.exact_obs_time !== undefined) {
    groups.push(`9${hour.encode(report.exact_obs_time.hour)}${minute.encode(report.exact_obs_time.minute)}`);
  }
  if (groups.some((group) => group.length !== 5)) {
    throw new EncodeError(`Section 1 produced a malformed group: ${groups.join(' ')}`);
  }
  return groups;
}
