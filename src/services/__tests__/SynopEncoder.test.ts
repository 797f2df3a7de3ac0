import { EncodeError } from '../../errors';
import type { SynopReport } from '../../types/synop.types';
import synopDecoder from '../SynopDecoder';
import synopEncoder from '../SynopEncoder';
import {
  ANTARCTIC_STATION,
  BUOY,
  LAND_STATION,
  MOBILE_LAND_STATION,
  REGION_I_STATION,
  SHIP_WITH_ICE,
} from './telegrams';

const landStation = (fields: SynopReport = {}): SynopReport => ({
  station_type: { value: 'AAXX' },
  obs_time: { day: { value: 1 }, hour: { value: 0 } },
  wind_indicator: { value: 4, unit: 'KT', estimated: false },
  station_id: { value: '88889' },
  ...fields,
});

describe('SynopEncoder', () => {
  describe('round trips', () => {
    it.each([
      ['a land station', LAND_STATION],
      ['a mobile land station', MOBILE_LAND_STATION],
      ['an Antarctic station', ANTARCTIC_STATION],
      ['a Region I station', REGION_I_STATION],
      ['a ship with sea ice in plain language', SHIP_WITH_ICE],
      ['a NIL report', 'AAXX 01004 88889 NIL'],
      ['a NIL ship report', 'BBXX ZDLP 19004 99607 50455 NIL'],
      ['Sections 4 and 5', 'AAXX 01004 88889 12782 61506 10094 333 10178 444 12345 555 11102 22108'],
      ['a 907 period that qualifies nothing', 'AAXX 01004 88889 12782 61506 333 90760'],
      ['a 907 period ahead of 909', 'AAXX 01004 88889 12782 61506 333 90710 90923 91120'],
      ['a ship with swell directions only', 'BBXX ZDLP 19004 99607 50455 41298 81307 222// 31020'],
      ['a ship with only the second swell', 'BBXX ZDLP 19004 99607 50455 41298 81307 222// 50807'],
      ['a mobile land station with the state of the ground', `${MOBILE_LAND_STATION} 333 34101`],
    ])('re-encodes %s unchanged', (_name, telegram) => {
      expect(synopEncoder.encode(synopDecoder.decode(telegram))).toBe(telegram);
    });

    it('drops groups that were not decoded', () => {
      expect(synopEncoder.encode(synopDecoder.decode(BUOY))).toBe(BUOY.replace(' 333 91212', ''));
    });
  });

  it('encodes a NIL report built by hand', () => {
    expect(synopEncoder.encode(landStation())).toBe('AAXX 01004 88889 NIL');
  });

  it('slash-fills the mandatory groups when only later groups are reported', () => {
    const report = landStation({
      air_temperature: { value: 9.4, unit: 'Cel' },
      maximum_temperature: { value: 17.8, unit: 'Cel' },
    });
    expect(synopEncoder.encode(report)).toBe('AAXX 01004 88889 ///// ///// 10094 333 10178');
  });

  describe('90-99 bands', () => {
    const visibility = { value: 1000, quantifier: null, unit: 'm' as const };

    it('uses the 0-89 visibility codes by default', () => {
      expect(synopEncoder.encode(landStation({ visibility }))).toBe('AAXX 01004 88889 ///10 /////');
    });

    it('switches visibility to codes 90-99 when asked', () => {
      expect(synopEncoder.encode(landStation({ visibility }), { useVisibility90: true }))
        .toBe('AAXX 01004 88889 ///94 /////');
    });

    it('prefers the band a decoded value came from over the options', () => {
      const report = landStation({ visibility: { ...visibility, use90: false } });
      expect(synopEncoder.encode(report, { useVisibility90: true })).toBe('AAXX 01004 88889 ///10 /////');
    });

    it('applies the cloud height option to every layer', () => {
      const report = landStation({
        visibility: null,
        cloud_layer: [{
          cloud_cover: null,
          genus: null,
          cloud_height: { value: 300, quantifier: null, unit: 'm' },
        }],
      });
      expect(synopEncoder.encode(report)).toBe('AAXX 01004 88889 ///// ///// 333 8//10');
      expect(synopEncoder.encode(report, { useCloudHeight90: true })).toBe('AAXX 01004 88889 ///// ///// 333 8//94');
    });
  });

  describe('errors', () => {
    it('rejects a report without an observation time', () => {
      const report: SynopReport = { station_type: { value: 'AAXX' }, station_id: { value: '88889' } };
      expect(() => synopEncoder.encode(report)).toThrow(EncodeError);
      expect(() => synopEncoder.encode(report)).toThrow('obs_time: Required');
    });

    it('rejects a ship report without a callsign', () => {
      const report: SynopReport = {
        station_type: { value: 'BBXX' },
        obs_time: { day: { value: 1 }, hour: { value: 0 } },
      };
      expect(() => synopEncoder.encode(report)).toThrow('callsign: callsign is required for BBXX reports');
    });

    it('rejects values with no code', () => {
      const report = landStation({ cloud_cover: { value: 12, obscured: false, unit: 'okta' } });
      expect(() => synopEncoder.encode(report)).toThrow('has no code in table 2700');
    });

    it('wraps conversion failures', () => {
      const report = landStation({ visibility: null, air_temperature: { value: 10, unit: 'Rankine' } });
      expect(() => synopEncoder.encode(report)).toThrow('encoding error: Cannot convert 10 from Rankine to Cel');
    });

    it('rejects unknown options', () => {
      const options = { useVisibility90: true, useFeet: true };
      expect(() => synopEncoder.encode(landStation(), options)).toThrow('invalid options');
    });
  });
});
