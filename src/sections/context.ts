import type {
  PeriodValue,
  StationType,
  SynopReport,
  WindUnit,
  WmoRegion,
} from '../types/synop.types';
import type { GroupReader } from '../utils/groupReader';

/** State carried between groups while one telegram is decoded */
export interface DecodeContext {
  stationType: StationType | null;
  windUnit: WindUnit | undefined;
  region: WmoRegion | 'SHIP' | null;
  /** Precipitation indicator routing: which of groups 6 (Section 1) and 6/7 (Section 3) may appear */
  precipitationInSection1: boolean;
  precipitationInSection3: boolean;
  automaticStation: boolean;
  /** Past weather period implied by the observation hour */
  defaultTimeBefore: PeriodValue | null;
  /** Period set by the last 907tt group */
  timeBefore: PeriodValue | null;
  /** Groups not decoded, for the report's `_not_implemented` list */
  notImplemented: string[];
}

/** State carried between groups while one report is encoded */
export interface EncodeContext {
  stationType: StationType;
  windUnit: WindUnit | undefined;
  useVisibility90: boolean;
  useCloudHeight90: boolean;
  defaultTimeBefore: PeriodValue | null;
  timeBefore: PeriodValue | null;
}

export function createDecodeContext(): DecodeContext {
  return {
    stationType: null,
    windUnit: undefined,
    region: null,
    precipitationInSection1: true,
    precipitationInSection3: true,
    automaticStation: false,
    defaultTimeBefore: null,
    timeBefore: null,
    notImplemented: [],
  };
}

/**
 * Past weather period for an observation hour: six hours at the main
 * synoptic hours, three at the intermediate ones.
 */
export function pastWeatherPeriod(hour: number): PeriodValue | null {
  if (hour % 6 === 0) {
    return { value: 6, unit: 'h' };
  }
  if (hour % 3 === 0) {
    return { value: 3, unit: 'h' };
  }
  return null;
}

/**
 * Decodes one group (and any continuation groups it pulls from `reader`)
 * into `report`.
 */
export type GroupHandler = (
  group: string,
  reader: GroupReader,
  report: SynopReport,
  context: DecodeContext,
) => void;
