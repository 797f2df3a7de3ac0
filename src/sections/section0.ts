import { codeTable0161, codeTable3333 } from '../codeTables';
import { DecodeError, EncodeError, InvalidCode } from '../errors';
import { decodeField, isAvailable, numericField, pad, slashes, tableField } from '../observations/Observation';
import type {
  Measure,
  RegionField,
  StationPosition,
  StationType,
  SynopReport,
  WindIndicator,
  WmoRegion,
} from '../types/synop.types';
import type { GroupReader } from '../utils/groupReader';
import logger from '../utils/logger';
import { pastWeatherPeriod, type DecodeContext, type EncodeContext } from './context';

const STATION_TYPES: readonly StationType[] = ['AAXX', 'BBXX', 'OOXX'];

/** WMO regional associations by station index number */
const STATION_REGIONS: ReadonlyArray<[WmoRegion, ReadonlyArray<[number, number]>]> = [
  ['I', [[60000, 69998]]],
  ['II', [
    [20000, 20099], [20200, 21998], [23001, 25998], [28001, 32998], [35001, 36998],
    [38001, 39998], [40350, 48599], [48800, 49998], [50001, 59998],
  ]],
  ['III', [[80001, 88998]]],
  ['IV', [[70001, 79998]]],
  ['V', [[48600, 48799], [90001, 98998]]],
  ['VI', [
    [1, 19998], [20100, 20199], [22001, 22998], [26001, 27998], [33001, 34998],
    [37001, 37998], [40001, 40349],
  ]],
  ['Antarctic', [[89001, 89998]]],
];

const CONFIDENCE_LEVELS: readonly string[] = ['Poor', 'Excellent', 'Good', 'Fair'];

const quadrant = tableField(codeTable3333, 1);
const buoyRegion = tableField(codeTable0161, 2);
const latitude = numericField({
  description: 'latitude', width: 3, unit: 'deg', max: 900, toValue: (tenths) => tenths / 10,
});
const longitude = numericField({
  description: 'longitude', width: 4, unit: 'deg', max: 1800, toValue: (tenths) => tenths / 10,
});

export function stationRegion(stationId: string): WmoRegion {
  const index = parseInt(stationId, 10);
  const match = STATION_REGIONS.find(([, ranges]) => ranges.some(([low, high]) => index >= low && index <= high));
  if (!match) {
    throw new DecodeError(`Unable to determine WMO region for station ${stationId}`);
  }
  return match[0];
}

function callsignRegion(callsign: string): RegionField {
  if (/^\d{5}$/.test(callsign)) {
    const region = decodeField(buoyRegion, callsign.slice(0, 2));
    if (region !== null) {
      return { value: region.value, _table: region._table };
    }
  }
  return { value: 'SHIP' };
}

function decodeWindIndicator(raw: string): WindIndicator | null {
  if (!isAvailable(raw)) {
    return null;
  }
  const code = parseInt(raw, 10);
  if (![0, 1, 3, 4].includes(code)) {
    logger.warn(new InvalidCode(raw, 'wind speed indicator').message);
    return null;
  }
  return {
    value: code,
    unit: code < 2 ? 'm/s' : 'KT',
    estimated: code === 0 || code === 3,
  };
}

function decodeObservationTime(group: string, report: SynopReport, context: DecodeContext): void {
  if (!/^\d{4}[\d/]$/.test(group)) {
    throw new DecodeError(`${group} is not a valid YYGGiw group`);
  }
  const day = parseInt(group.slice(0, 2), 10);
  const hour = parseInt(group.slice(2, 4), 10);
  if (day < 1 || day > 31 || hour > 24) {
    throw new DecodeError(`${group} does not hold a valid day and hour`);
  }
  report.obs_time = { day: { value: day }, hour: { value: hour } };
  report.wind_indicator = decodeWindIndicator(group.slice(4, 5));
  context.windUnit = report.wind_indicator?.unit;
  context.defaultTimeBefore = pastWeatherPeriod(hour);
}

function signed(measure: Measure | null, negative: boolean): Measure | null {
  if (measure === null || !negative) {
    return measure;
  }
  return { ...measure, value: -measure.value };
}

function decodePosition(groups: string[], stationType: StationType): StationPosition {
  const [latitudeGroup, longitudeGroup] = groups;
  if (!/^99[\d/]{3}$/.test(latitudeGroup)) {
    throw new DecodeError(`${latitudeGroup} is not a valid 99LaLaLa group`);
  }
  if (!/^[\d/]{5}$/.test(longitudeGroup)) {
    throw new DecodeError(`${longitudeGroup} is not a valid QcLoLoLoLo group`);
  }
  const globeQuadrant = decodeField(quadrant, longitudeGroup.slice(0, 1));
  const code = globeQuadrant?.value;
  const position: StationPosition = {
    latitude: signed(decodeField(latitude, latitudeGroup.slice(2, 5)), code === 3 || code === 5),
    longitude: signed(decodeField(longitude, longitudeGroup.slice(1, 5)), code === 5 || code === 7),
    quadrant: globeQuadrant,
  };
  if (stationType === 'OOXX') {
    decodeMobilePosition(groups.slice(2), position);
  }
  return position;
}

/** Marsden square and elevation groups of a mobile land station */
function decodeMobilePosition([marsdenGroup, elevationGroup]: string[], position: StationPosition): void {
  if (marsdenGroup === undefined || elevationGroup === undefined) {
    return;
  }
  const square = marsdenGroup.slice(0, 3);
  let marsden: Measure | null = null;
  if (isAvailable(square)) {
    const value = parseInt(square, 10);
    if ((value >= 1 && value <= 623) || (value >= 901 && value <= 936)) {
      marsden = { value };
    } else {
      logger.warn(new InvalidCode(square, 'Marsden square').message);
    }
  }
  position.marsden_square = marsden;
  checkUnitDigit(position.latitude, marsdenGroup.slice(3, 4), 'latitude');
  checkUnitDigit(position.longitude, marsdenGroup.slice(4, 5), 'longitude');

  const height = elevationGroup.slice(0, 4);
  const indicator = elevationGroup.slice(4, 5);
  const im = isAvailable(indicator) ? parseInt(indicator, 10) : null;
  const validIndicator = im !== null && im >= 1 && im <= 8;
  if (im !== null && !validIndicator) {
    logger.warn(new InvalidCode(indicator, 'indicator for elevation').message);
  }
  if (isAvailable(height)) {
    const value = parseInt(height, 10);
    position.elevation = validIndicator ? { value, unit: im <= 4 ? 'm' : 'ft' } : { value };
  } else {
    position.elevation = null;
  }
  position.confidence = validIndicator
    ? { value: CONFIDENCE_LEVELS[im % 4], _table: '1845', _code: im }
    : null;
}

function checkUnitDigit(coordinate: Measure | null, digit: string, description: string): void {
  if (coordinate === null || !isAvailable(digit)) {
    return;
  }
  const expected = Math.floor(Math.abs(coordinate.value)) % 10;
  if (parseInt(digit, 10) !== expected) {
    logger.warn(`Units digit ${digit} does not match ${description} ${coordinate.value}`);
  }
}

/**
 * Decodes Section 0 into `report`. Returns false when the telegram ends
 * before Section 0 is complete.
 */
export function decodeSection0(reader: GroupReader, report: SynopReport, context: DecodeContext): boolean {
  const typeGroup = reader.next();
  if (typeGroup === undefined) {
    throw new DecodeError('Report contains no groups');
  }
  const stationType = STATION_TYPES.find((type) => type === typeGroup);
  if (stationType === undefined) {
    throw new DecodeError(`${typeGroup} is not a valid station type`);
  }
  report.station_type = { value: stationType };
  context.stationType = stationType;

  let callsign: string | undefined;
  if (stationType !== 'AAXX') {
    callsign = reader.next()?.toUpperCase();
    if (callsign === undefined) {
      return false;
    }
    report.callsign = { value: callsign };
  }

  const timeGroup = reader.next();
  if (timeGroup === undefined) {
    return false;
  }
  decodeObservationTime(timeGroup, report, context);

  if (stationType === 'AAXX') {
    const stationId = reader.next();
    if (stationId === undefined) {
      return false;
    }
    if (!/^\d{5}$/.test(stationId)) {
      throw new DecodeError(`${stationId} is not a valid station identifier`);
    }
    report.station_id = { value: stationId };
    const region = stationRegion(stationId);
    report.region = { value: region };
    context.region = region;
    return true;
  }

  const count = stationType === 'BBXX' ? 2 : 4;
  const groups: string[] = [];
  while (groups.length < count) {
    const group = reader.next();
    if (group === undefined) {
      return false;
    }
    groups.push(group);
  }
  report.station_position = decodePosition(groups, stationType);
  if (stationType === 'BBXX' && callsign !== undefined) {
    report.region = callsignRegion(callsign);
    context.region = report.region.value;
  }
  return true;
}

function encodeCoordinate(coordinate: Measure | null, width: number): string {
  if (coordinate === null) {
    return slashes(width);
  }
  return pad(Math.round(Math.abs(coordinate.value) * 10), width, 'coordinate');
}

function quadrantCode(position: StationPosition): string {
  if (position.quadrant) {
    return String(position.quadrant.value);
  }
  if (position.latitude === null || position.longitude === null) {
    return '/';
  }
  const south = position.latitude.value < 0;
  const west = position.longitude.value < 0;
  if (south) {
    return west ? '5' : '3';
  }
  return west ? '7' : '1';
}

function unitDigit(coordinate: Measure | null): string {
  return coordinate === null ? '/' : String(Math.floor(Math.abs(coordinate.value)) % 10);
}

function elevationIndicator(position: StationPosition): string {
  if (position.confidence?._code !== undefined) {
    return String(position.confidence._code);
  }
  const level = position.confidence ? CONFIDENCE_LEVELS.indexOf(position.confidence.value) : -1;
  if (level < 0) {
    return '/';
  }
  const code = level === 0 ? 4 : level;
  return String(position.elevation?.unit === 'ft' ? code + 4 : code);
}

function encodePosition(position: StationPosition | undefined, stationType: StationType): string[] {
  if (position === undefined) {
    return stationType === 'BBXX' ? ['99///', '/////'] : ['99///', '/////', '/////', '/////'];
  }
  const groups = [
    `99${encodeCoordinate(position.latitude, 3)}`,
    `${quadrantCode(position)}${encodeCoordinate(position.longitude, 4)}`,
  ];
  if (stationType === 'OOXX') {
    const square = position.marsden_square ? pad(position.marsden_square.value, 3, 'Marsden square') : '///';
    const elevation = position.elevation ? pad(position.elevation.value, 4, 'elevation') : '////';
    groups.push(
      `${square}${unitDigit(position.latitude)}${unitDigit(position.longitude)}`,
      `${elevation}${elevationIndicator(position)}`,
    );
  }
  return groups;
}

export function encodeSection0(report: SynopReport, context: EncodeContext): string[] {
  const { stationType } = context;
  const groups: string[] = [stationType];
  if (stationType !== 'AAXX') {
    if (!report.callsign) {
      throw new EncodeError(`callsign is required for ${stationType} reports`);
    }
    groups.push(report.callsign.value);
  }
  if (!report.obs_time) {
    throw new EncodeError('obs_time is required');
  }
  const windIndicator = report.wind_indicator ? String(report.wind_indicator.value) : '/';
  groups.push(`${pad(report.obs_time.day.value, 2, 'day')}${pad(report.obs_time.hour.value, 2, 'hour')}${windIndicator}`);
  if (stationType === 'AAXX') {
    if (!report.station_id) {
      throw new EncodeError('station_id is required for AAXX reports');
    }
    groups.push(report.station_id.value);
  } else {
    groups.push(...encodePosition(report.station_position, stationType));
  }
  return groups;
}
