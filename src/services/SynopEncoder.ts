import config from '../config';
import { EncodeError } from '../errors';
import { encodeOptionsSchema, formatIssues, reportSchema } from '../schemas/report.schemas';
import { pastWeatherPeriod, type EncodeContext } from '../sections/context';
import { encodeSection0 } from '../sections/section0';
import { encodeSection1 } from '../sections/section1';
import { encodeSeaLandIce, encodeSection2, hasSection2 } from '../sections/section2';
import { encodeSection3, hasSection3 } from '../sections/section3';
import type { EncodeOptions, StationType, SynopReport } from '../types/synop.types';
import logger from '../utils/logger';

const HEADER_KEYS: ReadonlySet<string> = new Set([
  'station_type', 'callsign', 'obs_time', 'wind_indicator', 'station_id', 'region', 'station_position', '_not_implemented',
]);

/** Whether anything beyond the Section 0 header is reported */
function hasObservations(report: SynopReport): boolean {
  return Object.entries(report).some(([key, value]) => value !== undefined && !HEADER_KEYS.has(key));
}

/**
 * Turns structured reports back into FM-12 SYNOP telegrams
 */
class SynopEncoder {
  encode(report: SynopReport, options: EncodeOptions = {}): string {
    const parsedReport = reportSchema.safeParse(report);
    if (!parsedReport.success) {
      throw new EncodeError(`invalid report: ${formatIssues(parsedReport.error, 'report')}`);
    }
    const parsedOptions = encodeOptionsSchema.safeParse(options);
    if (!parsedOptions.success) {
      throw new EncodeError(`invalid options: ${formatIssues(parsedOptions.error, 'options')}`);
    }

    try {
      const context = this.createContext(report, parsedReport.data.station_type.value, parsedOptions.data);
      return this.encodeSections(report, context).join(' ');
    } catch (error) {
      if (error instanceof EncodeError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('Unexpected failure while encoding report', { error: reason });
      throw new EncodeError(reason);
    }
  }

  private encodeSections(report: SynopReport, context: EncodeContext): string[] {
    const groups = encodeSection0(report, context);
    const section2 = hasSection2(report);
    const section3 = hasSection3(report);
    if (!hasObservations(report)) {
      groups.push('NIL');
      return groups;
    }
    groups.push(...encodeSection1(report, context));
    if (section2) {
      groups.push(...encodeSection2(report));
    }
    if (report.sea_land_ice !== undefined) {
      groups.push(...encodeSeaLandIce(report.sea_land_ice));
    }
    if (section3) {
      groups.push(...encodeSection3(report, context));
    }
    if (report.section4 !== undefined) {
      groups.push('444', ...report.section4);
    }
    if (report.section5 !== undefined) {
      groups.push('555', ...report.section5);
    }
    return groups;
  }

  /**
   * The 90-99 bands are chosen from the first field of each family that
   * records which band it came from, then from the options, then from
   * configuration.
   */
  private createContext(report: SynopReport, stationType: StationType, options: EncodeOptions): EncodeContext {
    const visibilityBand = [
      report.visibility,
      ...(report.visibility_direction ?? []).map((entry) => entry.visibility),
    ].find((field) => field?.use90 !== undefined)?.use90;

    const cloudHeightBand = (report.cloud_layer ?? [])
      .map((layer) => layer.cloud_height)
      .find((field) => field?.use90 !== undefined)?.use90;

    return {
      stationType,
      windUnit: report.wind_indicator?.unit,
      useVisibility90: visibilityBand ?? options.useVisibility90 ?? config.encoder.useVisibility90,
      useCloudHeight90: cloudHeightBand ?? options.useCloudHeight90 ?? config.encoder.useCloudHeight90,
      defaultTimeBefore: report.obs_time ? pastWeatherPeriod(report.obs_time.hour.value) : null,
      timeBefore: null,
    };
  }
}

const synopEncoder = new SynopEncoder();
export { SynopEncoder };
export default synopEncoder;
