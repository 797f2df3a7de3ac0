import type { SynopReport } from '../../types/synop.types';
import { GroupReader } from '../../utils/groupReader';
import { createDecodeContext } from '../context';
import {
  decodeDisplacement,
  decodeSeaLandIce,
  encodeSeaLandIce,
  encodeSection2,
  hasSection2,
  section2Handlers,
} from '../section2';

function decodeGroups(message: string): { report: SynopReport; notImplemented: string[] } {
  const [header, ...groups] = message.split(' ');
  const context = { ...createDecodeContext(), stationType: 'BBXX' as const };
  const report: SynopReport = { displacement: decodeDisplacement(header) };
  const reader = new GroupReader('');
  for (const group of groups) {
    section2Handlers[Number(group.charAt(0))](group, reader, report, context);
  }
  return { report, notImplemented: context.notImplemented };
}

describe('section 2', () => {
  describe('decodeDisplacement', () => {
    it('decodes course and speed', () => {
      expect(decodeDisplacement('22251')).toEqual({
        direction: { value: 'SW', isCalmOrStationary: false, allDirections: false, _table: '0700', _code: 5 },
        speed: {
          value: [
            { min: 1, max: 5, quantifier: null, unit: 'KT' },
            { min: 1, max: 10, quantifier: null, unit: 'km/h' },
          ],
          _table: '4451',
          _code: 1,
        },
      });
    });

    it('is null when the group is slash-filled', () => {
      expect(decodeDisplacement('222//')).toBeNull();
    });
  });

  describe('handlers', () => {
    const { report, notImplemented } = decodeGroups('22251 00268 10804 20604 310// 40802 61234 70021 80092');

    it('decodes the sea surface temperature and its method', () => {
      expect(report.sea_surface_temperature).toEqual({
        value: 26.8,
        unit: 'Cel',
        measurement_type: { value: 'Intake', _table: '3850', _code: 0 },
      });
    });

    it('collects instrumental, estimated and accurate wind waves', () => {
      expect(report.wind_waves).toEqual([
        { period: { value: 8, unit: 's' }, height: { value: 2, unit: 'm' }, instrumental: true, accurate: false, confused: false },
        { period: { value: 6, unit: 's' }, height: { value: 2, unit: 'm' }, instrumental: false, accurate: false, confused: false },
        { period: null, height: { value: 2.1, unit: 'm' }, instrumental: true, accurate: true, confused: false },
      ]);
    });

    it('fills in the swell systems opened by the direction group', () => {
      expect(report.swell_waves).toEqual([
        {
          system: 1,
          direction: { value: 100, calm: false, varAllUnknown: false, unit: 'deg', _table: '0877', _code: 10 },
          period: { value: 8, unit: 's' },
          height: { value: 1, unit: 'm' },
        },
        { system: 2, direction: null },
      ]);
    });

    it('keeps swell directions sent without periods', () => {
      expect(decodeGroups('222// 31020').report.swell_waves).toEqual([
        { system: 1, direction: { value: 100, calm: false, varAllUnknown: false, unit: 'deg', _table: '0877', _code: 10 } },
        { system: 2, direction: { value: 200, calm: false, varAllUnknown: false, unit: 'deg', _table: '0877', _code: 20 } },
      ]);
    });

    it('records a second swell sent on its own', () => {
      expect(decodeGroups('222// 50807').report.swell_waves).toEqual([
        { system: 2, period: { value: 8, unit: 's' }, height: { value: 3.5, unit: 'm' } },
      ]);
    });

    it('decodes ice accretion', () => {
      expect(report.ice_accretion).toEqual({
        source: { spray: true, fog: false, rain: false, _table: '1751', _code: 1 },
        thickness: { value: 23, unit: 'cm' },
        rate: { value: 'Ice melting or breaking up rapidly', _table: '3551', _code: 4 },
      });
    });

    it('decodes the wet-bulb temperature with its sign', () => {
      expect(report.wet_bulb_temperature).toEqual({
        sign: 1, measured: true, iced: false, _table: '3855', _code: 0, value: 9.2, unit: 'Cel',
      });
      expect(notImplemented).toEqual([]);
    });

    it('reads a negative sea temperature from an odd method code', () => {
      const cold = decodeGroups('222// 01019').report;
      expect(cold.sea_surface_temperature?.value).toBe(-1.9);
      expect(cold.sea_surface_temperature?.measurement_type).toEqual({ value: 'Intake', _table: '3850', _code: 1 });
    });

    it('marks a period of 99 as confused sea', () => {
      expect(decodeGroups('222// 29904').report.wind_waves?.[0]).toEqual({
        period: null, height: { value: 2, unit: 'm' }, instrumental: false, accurate: false, confused: true,
      });
    });

    it('leaves 7-groups with a non-zero second figure undecoded', () => {
      expect(decodeGroups('222// 71021').notImplemented).toEqual(['71021']);
    });
  });

  describe('decodeSeaLandIce', () => {
    it('decodes a cSbDz group', () => {
      expect(decodeSeaLandIce(['21374'])).toEqual({
        concentration: { value: 2, _table: '0639' },
        development: { value: 1, _table: '3739' },
        land_origin: { value: 3, _table: '0439' },
        direction: { value: 'NW', in_shore: false, in_ice: false, _table: '0739', _code: 7 },
        condition_trend: { value: 4, _table: '5239' },
      });
    });

    it('keeps plain language as text', () => {
      expect(decodeSeaLandIce(['icy', 'conditions'])).toEqual({ text: 'icy conditions' });
    });

    it('is null when nothing or only slashes follow', () => {
      expect(decodeSeaLandIce([])).toBeNull();
      expect(decodeSeaLandIce(['/////'])).toBeNull();
    });
  });

  describe('encoding', () => {
    it('re-encodes decoded groups in header order', () => {
      const groups = '22251 00268 10804 20604 310// 40802 61234 70021 80092';
      expect(encodeSection2(decodeGroups(groups).report).join(' ')).toBe(groups);
    });

    it.each([
      ['a second swell on its own', '222// 50807'],
      ['swell directions without periods', '222// 31020'],
      ['both swell systems', '222// 31020 40807 5////'],
    ])('re-encodes %s', (_name, groups) => {
      expect(encodeSection2(decodeGroups(groups).report).join(' ')).toBe(groups);
    });

    it('adds the sign to the sea temperature method', () => {
      const report: SynopReport = {
        sea_surface_temperature: { value: -1.5, unit: 'Cel', measurement_type: { value: 'Bucket' } },
      };
      expect(encodeSection2(report)).toEqual(['222//', '03015']);
    });

    it('writes a 99 period for confused sea', () => {
      const report: SynopReport = {
        wind_waves: [{ period: null, height: { value: 1.5, unit: 'm' }, instrumental: false, accurate: false, confused: true }],
      };
      expect(encodeSection2(report)).toEqual(['222//', '29903']);
    });

    it('encodes sea ice', () => {
      expect(encodeSeaLandIce(null)).toEqual(['ICE', '/////']);
      expect(encodeSeaLandIce({ text: 'icy conditions' })).toEqual(['ICE', 'icy', 'conditions']);
      expect(encodeSeaLandIce(decodeSeaLandIce(['21374']))).toEqual(['ICE', '21374']);
    });

    it('does not start Section 2 for sea ice alone', () => {
      expect(hasSection2({ sea_land_ice: { text: 'icy' } })).toBe(false);
      expect(hasSection2({ displacement: null })).toBe(true);
    });
  });
});
