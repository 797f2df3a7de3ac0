import { DecodeError } from '../../errors';
import logger from '../../utils/logger';
import synopDecoder from '../SynopDecoder';
import {
  ANTARCTIC_STATION,
  BUOY,
  LAND_STATION,
  MOBILE_LAND_STATION,
  REGION_I_STATION,
  SHIP_WITH_ICE,
} from './telegrams';

describe('SynopDecoder', () => {
  it('decodes a land station report', () => {
    expect(synopDecoder.decode(LAND_STATION)).toEqual({
      station_type: { value: 'AAXX' },
      obs_time: { day: { value: 1 }, hour: { value: 0 } },
      wind_indicator: { value: 4, unit: 'KT', estimated: false },
      station_id: { value: '88889' },
      region: { value: 'III' },
      precipitation_indicator: { value: 1, in_group_1: true, in_group_3: false },
      weather_indicator: { value: 2, automatic: false },
      lowest_cloud_base: { min: 1500, max: 2000, quantifier: null, unit: 'm', _table: '1600', _code: 7 },
      visibility: { value: 40000, quantifier: null, use90: false, unit: 'm', _table: '4377', _code: 82 },
      cloud_cover: { value: 6, obscured: false, unit: 'okta', _table: '2700', _code: 6 },
      surface_wind: {
        direction: { value: 150, calm: false, varAllUnknown: false, unit: 'deg', _table: '0877', _code: 15 },
        speed: { value: 6, unit: 'KT' },
      },
      air_temperature: { value: 9.4, unit: 'Cel' },
      dewpoint_temperature: { value: 4.7, unit: 'Cel' },
      station_pressure: { value: 1011.1, unit: 'hPa' },
      sea_level_pressure: { value: 1019.7, unit: 'hPa' },
      pressure_tendency: {
        tendency: { value: 3, _table: '0200' },
        change: { value: 0.7, unit: 'hPa' },
      },
      precipitation_s1: {
        amount: { value: 0, quantifier: null, trace: false, unit: 'mm', _table: '3590', _code: 0 },
        time_before_obs: { value: 6, unit: 'h', _table: '4019', _code: 1 },
      },
      present_weather: { value: 1, _table: '4677', time_before_obs: { value: 6, unit: 'h' } },
      past_weather: [{ value: 0, _table: '4561' }, { value: 2, _table: '4561' }],
      cloud_types: {
        low_cloud_type: { value: 5, _table: '0513' },
        middle_cloud_type: { value: 4, _table: '0515' },
        high_cloud_type: { value: 1, _table: '0509' },
        low_cloud_amount: { value: 1, unit: 'okta' },
      },
      maximum_temperature: { value: 17.8, unit: 'Cel' },
      minimum_temperature: { value: -7.3, unit: 'Cel' },
      ground_state: {
        state: { value: 4, _table: '0901' },
        temperature: { value: -1, unit: 'Cel' },
      },
    });
  });

  it('decodes a buoy report with Sections 2 and 5', () => {
    const report = synopDecoder.decode(BUOY);
    expect(report.region).toEqual({ value: 'V', _table: '0161' });
    expect(report.station_position?.latitude).toEqual({ value: 17, unit: 'deg' });
    expect(report.station_position?.longitude).toEqual({ value: -157.7, unit: 'deg' });
    expect(report.surface_wind?.speed).toEqual({ value: 9, unit: 'm/s' });
    expect(report.exact_obs_time).toEqual({ hour: { value: 23 }, minute: { value: 50 } });
    expect(report.sea_surface_temperature?.value).toBe(26.8);
    expect(report.wind_waves?.map((wave) => wave.height?.value)).toEqual([2, 2, 2.1]);
    expect(report.swell_waves?.[0].direction?.value).toBe(100);
    expect(report.ice_accretion?.thickness).toEqual({ value: 23, unit: 'cm' });
    expect(report.wet_bulb_temperature?.value).toBe(9.2);
    expect(report.section5).toEqual(['11102', '22108', '8//10', '92344']);
    expect(report._not_implemented).toEqual(['91212']);
  });

  it('decodes a mobile land station report', () => {
    const report = synopDecoder.decode(MOBILE_LAND_STATION);
    expect(report.station_position?.marsden_square).toEqual({ value: 560 });
    expect(report.station_position?.confidence?.value).toBe('Excellent');
    expect(report.precipitation_indicator).toEqual({ value: 4, in_group_1: false, in_group_3: false });
    expect(report.weather_indicator).toEqual({ value: 6, automatic: true });
    expect(report.surface_wind?.speed).toEqual({ value: 19, unit: 'KT' });
    expect(report.air_temperature).toEqual({ value: -25.9, unit: 'Cel' });
    expect(report.pressure_tendency).toEqual({ tendency: null, change: null });
    expect(report.exact_obs_time).toEqual({ hour: { value: 21 }, minute: { value: 0 } });
  });

  it('decodes an Antarctic report', () => {
    const report = synopDecoder.decode(ANTARCTIC_STATION);
    expect(report.region).toEqual({ value: 'Antarctic' });
    expect(report.surface_wind?.speed).toEqual({ value: 113, unit: 'KT' });
    expect(report.relative_humidity).toEqual({ value: 79, unit: '%' });
    expect(report.station_pressure).toEqual({ value: 770.8, unit: 'hPa' });
    expect(report.max_wind?.speed).toEqual({ value: 68, unit: 'KT' });
  });

  it('decodes the Region I group of Section 3', () => {
    const report = synopDecoder.decode(REGION_I_STATION);
    expect(report.ground_minimum_temperature).toEqual({ value: 24, unit: 'Cel' });
    expect(report.local_precipitation?.character?.value).toBe('Heavy intermittent');
    expect(report.precipitation_s1?.time_before_obs).toEqual({ value: 24, unit: 'h', _table: '4019', _code: 4 });
  });

  it('decodes sea ice in plain language', () => {
    const report = synopDecoder.decode(SHIP_WITH_ICE);
    expect(report.region).toEqual({ value: 'SHIP' });
    expect(report.visibility).toEqual({ value: 20000, quantifier: null, use90: true, unit: 'm', _table: '4377', _code: 98 });
    expect(report.sea_surface_temperature).toEqual({
      value: 1.9,
      unit: 'Cel',
      measurement_type: { value: 'Hull contact sensor', _table: '3850', _code: 4 },
    });
    expect(report.wet_bulb_temperature?.value).toBe(-0.1);
    expect(report.sea_land_ice).toEqual({ text: 'icy conditions' });
  });

  it('decodes a NIL report to Section 0 only', () => {
    expect(synopDecoder.decode('AAXX 01004 88889 nil')).toEqual({
      station_type: { value: 'AAXX' },
      obs_time: { day: { value: 1 }, hour: { value: 0 } },
      wind_indicator: { value: 4, unit: 'KT', estimated: false },
      station_id: { value: '88889' },
      region: { value: 'III' },
    });
  });

  it('returns what it has when the telegram ends early', () => {
    const report = synopDecoder.decode('AAXX 01004 88889 12782');
    expect(report.visibility?.value).toBe(40000);
    expect(report.surface_wind).toBeUndefined();
  });

  it('keeps Sections 4 and 5 verbatim', () => {
    const report = synopDecoder.decode('AAXX 01004 88889 12782 61506 333 10178 444 12345 555 11102 22108');
    expect(report.maximum_temperature).toEqual({ value: 17.8, unit: 'Cel' });
    expect(report.section4).toEqual(['12345']);
    expect(report.section5).toEqual(['11102', '22108']);
  });

  it('skips groups out of order or malformed', () => {
    const report = synopDecoder.decode('AAXX 01004 88889 12782 61506 30111 20047 4ABCD 53007');
    expect(report.station_pressure).toEqual({ value: 1011.1, unit: 'hPa' });
    expect(report.dewpoint_temperature).toBeUndefined();
    expect(report.pressure_tendency?.tendency).toEqual({ value: 3, _table: '0200' });
    expect(report._not_implemented).toEqual(['20047', '4ABCD']);
  });

  it('allows cloud layers and 9-groups to repeat in Section 3', () => {
    const report = synopDecoder.decode('AAXX 01004 88889 12782 61506 333 82360 85815 91120 99612');
    expect(report.cloud_layer).toHaveLength(2);
    expect(report.highest_gust).toEqual([{ speed: { value: 20, unit: 'KT' } }]);
    expect(report.sudden_temperature_change).toEqual({ value: 12, unit: 'Cel' });
  });

  describe('Section 2 from a land station', () => {
    const warning = 'Section 2 sent by a station that is not a sea station';
    let warn: jest.SpyInstance;

    beforeEach(() => {
      warn = jest.spyOn(logger, 'warn');
    });

    afterEach(() => {
      warn.mockRestore();
    });

    it('decodes the section and logs a warning', () => {
      const report = synopDecoder.decode('AAXX 01004 88889 12782 61506 222// 31020');
      expect(report.swell_waves).toHaveLength(2);
      expect(warn).toHaveBeenCalledWith(warning, { stationType: 'AAXX' });
    });

    it('does not warn for ships', () => {
      synopDecoder.decode(BUOY);
      expect(warn).not.toHaveBeenCalledWith(warning, expect.anything());
    });
  });

  it('throws DecodeError for malformed mandatory groups', () => {
    expect(() => synopDecoder.decode('AAXX 01004 88889 1278 61506')).toThrow(DecodeError);
    expect(() => synopDecoder.decode('METAR EGLL')).toThrow('METAR is not a valid station type');
    expect(() => synopDecoder.decode('AAXX 01004 99999 12782 61506')).toThrow('Unable to determine WMO region for station 99999');
  });
});
