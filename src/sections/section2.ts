import {
  codeTable0439,
  codeTable0639,
  codeTable0739,
  codeTable1751,
  codeTable3551,
  codeTable3739,
  codeTable3850,
  codeTable3855,
  codeTable4451,
  codeTable5239,
} from '../codeTables';
import { direction, windDirection } from '../observations/fields';
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
  Displacement,
  IceAccretion,
  SeaLandIce,
  SeaSurfaceTemperature,
  SwellWave,
  SynopReport,
  WetBulbTemperature,
  WindWave,
} from '../types/synop.types';
import logger from '../utils/logger';
import type { GroupHandler } from './context';

const shipSpeed = tableField(codeTable4451, 1);
const sstMethod = tableField(codeTable3850, 1);
const wetBulbStatus = tableField(codeTable3855, 1);
const iceSource = tableField(codeTable1751, 1);
const iceRate = tableField(codeTable3551, 1);
const iceThickness = numericField({ description: 'thickness of ice accretion', width: 2, unit: 'cm', unitType: 'length' });
const tenthsOfDegree = numericField({ description: 'temperature', width: 3, toValue: (tenths) => tenths / 10 });

const wavePeriod = numericField({ description: 'period of waves', width: 2, unit: 's', unitType: 'time' });
const waveHeight = numericField({
  description: 'height of waves',
  width: 2,
  unit: 'm',
  unitType: 'length',
  toValue: (halfMetres) => halfMetres * 0.5,
  toCode: (metres) => Math.round(metres * 2),
});
const accurateWaveHeight = numericField({
  description: 'height of waves',
  width: 3,
  unit: 'm',
  unitType: 'length',
  toValue: (decimetres) => decimetres / 10,
  toCode: (metres) => Math.round(metres * 10),
});

const iceConcentration = tableField(codeTable0639, 1);
const iceDevelopment = tableField(codeTable3739, 1);
const iceOfLandOrigin = tableField(codeTable0439, 1);
const iceEdgeBearing = tableField(codeTable0739, 1);
const iceTrend = tableField(codeTable5239, 1);

/** `222Dv`: ship's course and speed over the past three hours */
export function decodeDisplacement(group: string): Displacement | null {
  const Dv = group.slice(3, 5);
  if (!isAvailable(Dv)) {
    return null;
  }
  return {
    direction: decodeField(direction, Dv.slice(0, 1)),
    speed: decodeField(shipSpeed, Dv.slice(1, 2)),
  };
}

const decodeSeaSurfaceTemperature: GroupHandler = (group, _reader, report) => {
  const method = decodeField(sstMethod, group.slice(1, 2));
  const magnitude = decodeField(tenthsOfDegree, group.slice(2, 5));
  if (method === null || magnitude === null) {
    report.sea_surface_temperature = null;
    return;
  }
  const negative = method._code !== undefined && method._code % 2 === 1;
  report.sea_surface_temperature = {
    value: negative ? -magnitude.value : magnitude.value,
    unit: 'Cel',
    measurement_type: method,
  };
};

function decodeWindWave(group: string, instrumental: boolean): WindWave {
  const period = decodeField(wavePeriod, group.slice(1, 3));
  const confused = period !== null && period.value === 99;
  return {
    period: confused ? null : period,
    height: decodeField(waveHeight, group.slice(3, 5)),
    instrumental,
    accurate: false,
    confused,
  };
}

function addWindWave(report: SynopReport, wave: WindWave): void {
  report.wind_waves = [...(report.wind_waves ?? []), wave];
}

const decodeInstrumentalWaves: GroupHandler = (group, _reader, report) => {
  addWindWave(report, decodeWindWave(group, true));
};

const decodeEstimatedWaves: GroupHandler = (group, _reader, report) => {
  addWindWave(report, decodeWindWave(group, false));
};

/** `3dddd` opens an entry for each swell system; its 4- and 5-groups fill them in */
const decodeSwellDirections: GroupHandler = (group, _reader, report) => {
  report.swell_waves = [
    ...(report.swell_waves ?? []),
    { system: 1, direction: decodeField(windDirection, group.slice(1, 3)) },
    { system: 2, direction: decodeField(windDirection, group.slice(3, 5)) },
  ];
};

function swellHandler(system: 1 | 2): GroupHandler {
  return (group, _reader, report) => {
    const period = decodeField(wavePeriod, group.slice(1, 3));
    const height = decodeField(waveHeight, group.slice(3, 5));
    const waves = report.swell_waves ?? [];
    const opened = waves.find((wave) => wave.system === system && wave.period === undefined && wave.height === undefined);
    if (opened) {
      opened.period = period;
      opened.height = height;
    } else {
      waves.push({ system, period, height });
    }
    report.swell_waves = waves;
  };
}

const decodeIceAccretion: GroupHandler = (group, _reader, report) => {
  report.ice_accretion = {
    source: decodeField(iceSource, group.slice(1, 2)),
    thickness: decodeField(iceThickness, group.slice(2, 4)),
    rate: decodeField(iceRate, group.slice(4, 5)),
  };
};

const decodeAccurateWaves: GroupHandler = (group, _reader, report, context) => {
  if (group.slice(1, 2) !== '0') {
    logger.warn(`${group} is not a valid 70HHH group`);
    context.notImplemented.push(group);
    return;
  }
  addWindWave(report, {
    period: null,
    height: decodeField(accurateWaveHeight, group.slice(2, 5)),
    instrumental: true,
    accurate: true,
    confused: false,
  });
};

const decodeWetBulbTemperature: GroupHandler = (group, _reader, report) => {
  const status = decodeField(wetBulbStatus, group.slice(1, 2));
  const magnitude = decodeField(tenthsOfDegree, group.slice(2, 5));
  if (status === null || magnitude === null) {
    report.wet_bulb_temperature = null;
    return;
  }
  report.wet_bulb_temperature = {
    ...status,
    value: status.sign === -1 ? -magnitude.value : magnitude.value,
    unit: 'Cel',
  };
};

export const section2Handlers: Readonly<Record<number, GroupHandler>> = {
  0: decodeSeaSurfaceTemperature,
  1: decodeInstrumentalWaves,
  2: decodeEstimatedWaves,
  3: decodeSwellDirections,
  4: swellHandler(1),
  5: swellHandler(2),
  6: decodeIceAccretion,
  7: decodeAccurateWaves,
  8: decodeWetBulbTemperature,
};

/**
 * Groups following `ICE`: a single `cSbDz` group, or plain language.
 */
export function decodeSeaLandIce(groups: string[]): SeaLandIce | null {
  const [first] = groups;
  if (!isAvailable(first)) {
    return null;
  }
  if (groups.length === 1 && /^[\d/]{5}$/.test(first)) {
    return {
      concentration: decodeField(iceConcentration, first.slice(0, 1)),
      development: decodeField(iceDevelopment, first.slice(1, 2)),
      land_origin: decodeField(iceOfLandOrigin, first.slice(2, 3)),
      direction: decodeField(iceEdgeBearing, first.slice(3, 4)),
      condition_trend: decodeField(iceTrend, first.slice(4, 5)),
    };
  }
  return { text: groups.join(' ') };
}

// --- Encoding ---

const SECTION2_KEYS: readonly (keyof SynopReport)[] = [
  'sea_surface_temperature',
  'wind_waves',
  'swell_waves',
  'ice_accretion',
  'wet_bulb_temperature',
];

export function hasSection2(report: SynopReport): boolean {
  return report.displacement !== undefined || SECTION2_KEYS.some((key) => report[key] !== undefined);
}

function encodeDisplacement(displacement: Displacement | null | undefined): string {
  if (displacement === null || displacement === undefined) {
    return '222//';
  }
  return `222${direction.encode(displacement.direction)}${shipSpeed.encode(displacement.speed)}`;
}

function encodeSeaSurfaceTemperature(sst: SeaSurfaceTemperature | null): string {
  if (sst === null) {
    return '0////';
  }
  const celsius = inUnit(sst, 'Cel', 'temperature');
  const method = sst.measurement_type._code
    ?? codeTable3850.encode(sst.measurement_type) + (celsius < 0 ? 1 : 0);
  return `0${method}${pad(Math.round(Math.abs(celsius) * 10), 3, 'sea surface temperature')}`;
}

function encodeWindWave(header: '1' | '2', wave: WindWave): string {
  const period = wave.confused ? '99' : wavePeriod.encode(wave.period);
  return `${header}${period}${waveHeight.encode(wave.height)}`;
}

/** Groups 1 and 2; the first matching entry of each kind is sent */
function encodeWindWaves(waves: WindWave[]): string[] {
  const groups: string[] = [];
  const instrumental = waves.find((wave) => wave.instrumental && !wave.accurate);
  const estimated = waves.find((wave) => !wave.instrumental);
  if (instrumental) {
    groups.push(encodeWindWave('1', instrumental));
  }
  if (estimated) {
    groups.push(encodeWindWave('2', estimated));
  }
  return groups;
}

function encodeSwellWaves(waves: SwellWave[]): string[] {
  const first = waves.find((wave) => wave.system === 1);
  const second = waves.find((wave) => wave.system === 2);
  const groups: string[] = [];
  if (waves.some((wave) => wave.direction !== undefined)) {
    groups.push(`3${windDirection.encode(first?.direction)}${windDirection.encode(second?.direction)}`);
  }
  for (const wave of [first, second]) {
    if (wave !== undefined && (wave.period !== undefined || wave.height !== undefined)) {
      groups.push(`${wave.system + 3}${wavePeriod.encode(wave.period)}${waveHeight.encode(wave.height)}`);
    }
  }
  return groups;
}

function encodeIceAccretion(ice: IceAccretion): string {
  return `6${iceSource.encode(ice.source)}${iceThickness.encode(ice.thickness)}${iceRate.encode(ice.rate)}`;
}

function encodeWetBulbTemperature(wetBulb: WetBulbTemperature | null): string {
  if (wetBulb === null || wetBulb.value === null) {
    return `8${wetBulbStatus.encode(wetBulb)}///`;
  }
  const celsius = inUnit({ value: wetBulb.value, unit: wetBulb.unit }, 'Cel', 'temperature');
  return `8${wetBulbStatus.encode(wetBulb)}${pad(Math.round(Math.abs(celsius) * 10), 3, 'wet-bulb temperature')}`;
}

export function encodeSection2(report: SynopReport): string[] {
  const groups = [encodeDisplacement(report.displacement)];
  if (report.sea_surface_temperature !== undefined) {
    groups.push(encodeSeaSurfaceTemperature(report.sea_surface_temperature));
  }
  if (report.wind_waves !== undefined) {
    groups.push(...encodeWindWaves(report.wind_waves));
  }
  if (report.swell_waves !== undefined) {
    groups.push(...encodeSwellWaves(report.swell_waves));
  }
  if (report.ice_accretion !== undefined) {
    groups.push(encodeIceAccretion(report.ice_accretion));
  }
  const accurate = report.wind_waves?.find((wave) => wave.accurate);
  if (accurate) {
    groups.push(`70${accurateWaveHeight.encode(accurate.height)}`);
  }
  if (report.wet_bulb_temperature !== undefined) {
    groups.push(encodeWetBulbTemperature(report.wet_bulb_temperature));
  }
  return groups;
}

export function encodeSeaLandIce(ice: SeaLandIce | null): string[] {
  if (ice === null) {
    return ['ICE', slashes(5)];
  }
  if ('text' in ice) {
    return ['ICE', ...ice.text.split(/\s+/)];
  }
  return [
    'ICE',
    [
      iceConcentration.encode(ice.concentration),
      iceDevelopment.encode(ice.development),
      iceOfLandOrigin.encode(ice.land_origin),
      iceEdgeBearing.encode(ice.direction),
      iceTrend.encode(ice.condition_trend),
    ].join(''),
  ];
}
