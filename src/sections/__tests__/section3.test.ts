import { EncodeError } from '../../errors';
import type { SynopReport } from '../../types/synop.types';
import { GroupReader } from '../../utils/groupReader';
import { createDecodeContext, type DecodeContext, type EncodeContext } from '../context';
import { encodeSection3, hasSection3, samePeriod, section3Handlers } from '../section3';

function landContext(overrides: Partial<DecodeContext> = {}): DecodeContext {
  return { ...createDecodeContext(), stationType: 'AAXX', windUnit: 'KT', region: 'III', ...overrides };
}

function decodeGroups(message: string, context = landContext()): { report: SynopReport; notImplemented: string[] } {
  const reader = new GroupReader(message);
  const report: SynopReport = {};
  for (let group = reader.next(); group !== undefined; group = reader.next()) {
    section3Handlers[Number(group.charAt(0))](group, reader, report, context);
  }
  return { report, notImplemented: context.notImplemented };
}

function encodeContext(): EncodeContext {
  return {
    stationType: 'AAXX',
    windUnit: 'KT',
    useVisibility90: false,
    useCloudHeight90: false,
    defaultTimeBefore: null,
    timeBefore: null,
  };
}

describe('section 3', () => {
  describe('regional group 0', () => {
    it('decodes ground minimum temperature and local precipitation in Region I', () => {
      const { report } = decodeGroups('02434', landContext({ region: 'I' }));
      expect(report.ground_minimum_temperature).toEqual({ value: 24, unit: 'Cel' });
      expect(report.local_precipitation).toEqual({
        character: { value: 'Heavy intermittent', _table: '167', _code: 3 },
        time: { min: 3, max: 4, quantifier: null, unit: 'h', _table: '168', _code: 4 },
      });
    });

    it('reads ground minimum codes above 50 as negative', () => {
      const { report } = decodeGroups('0573/', landContext({ region: 'I' }));
      expect(report.ground_minimum_temperature).toEqual({ value: -7, unit: 'Cel' });
    });

    it('decodes the maximum wind in the Antarctic', () => {
      const { report } = decodeGroups('01299 00120', landContext({ region: 'Antarctic' }));
      expect(report.max_wind?.speed).toEqual({ value: 120, unit: 'KT' });
      expect(report.max_wind?.direction?.value).toBe(120);
    });

    it('leaves the group undecoded in other regions', () => {
      expect(decodeGroups('01268').notImplemented).toEqual(['01268']);
    });
  });

  describe('groups 1 to 4', () => {
    it('decodes extreme temperatures and the state of the ground', () => {
      const { report } = decodeGroups('10178 21073 34101 41998');
      expect(report.maximum_temperature).toEqual({ value: 17.8, unit: 'Cel' });
      expect(report.minimum_temperature).toEqual({ value: -7.3, unit: 'Cel' });
      expect(report.ground_state).toEqual({
        state: { value: 4, _table: '0901' },
        temperature: { value: -1, unit: 'Cel' },
      });
      expect(report.ground_state_snow).toEqual({
        state: { value: 1, _table: '0975' },
        depth: { value: null, quantifier: null, continuous: false, impossible: false, unit: 'cm', _table: '3889', _code: 998 },
      });
    });

    it('decodes the state of the ground from mobile land stations', () => {
      const { report, notImplemented } = decodeGroups('34101', landContext({ stationType: 'OOXX' }));
      expect(report.ground_state).toEqual({
        state: { value: 4, _table: '0901' },
        temperature: { value: -1, unit: 'Cel' },
      });
      expect(notImplemented).toEqual([]);
    });

    it('does not decode the state of the ground from ships', () => {
      const { report, notImplemented } = decodeGroups('34101', landContext({ stationType: 'BBXX' }));
      expect(report.ground_state).toBeUndefined();
      expect(notImplemented).toEqual(['34101']);
    });
  });

  describe('group 5', () => {
    it('decodes evaporation, temperature change, cloud drift and elevation', () => {
      const { report } = decodeGroups('50123 54315 56123 57815 59012');
      expect(report.evapotranspiration).toEqual({
        amount: { value: 1.2, unit: 'mm' },
        type: { value: 'evaporation', _table: '1806', _code: 3 },
      });
      expect(report.temperature_change).toEqual({
        time_before_obs: { value: 3, unit: 'h' },
        change: { value: -5, unit: 'Cel' },
      });
      expect(report.cloud_drift_direction?.high).toEqual({
        value: 'SE', isCalmOrStationary: false, allDirections: false, _table: '0700', _code: 3,
      });
      expect(report.cloud_elevation?.genus).toEqual({ value: 'Cu', _table: '0500', _code: 8 });
      expect(report.cloud_elevation?.elevation).toEqual({
        value: 12, quantifier: null, visible: true, unit: 'deg', _table: '1004', _code: 5,
      });
      expect(report.pressure_change).toEqual({ value: -1.2, unit: 'hPa' });
    });

    it('reads daily sunshine with the radiation groups that follow it', () => {
      const { report } = decodeGroups('55055 20123 30456');
      expect(report.sunshine).toEqual({ amount: { value: 5.5, unit: 'h' }, duration: { value: 24, unit: 'h' } });
      expect(report.radiation).toEqual([
        { kind: 'global_solar', amount: { value: 123, unit: 'J/cm2' }, time_before_obs: { value: 24, unit: 'h' } },
        { kind: 'diffused_solar', amount: { value: 456, unit: 'J/cm2' }, time_before_obs: { value: 24, unit: 'h' } },
      ]);
    });

    it('reads hourly sunshine in kJ/m2', () => {
      const { report } = decodeGroups('55305 40012');
      expect(report.sunshine).toEqual({ amount: { value: 0.5, unit: 'h' }, duration: { value: 1, unit: 'h' } });
      expect(report.radiation).toEqual([
        { kind: 'downward_long_wave', amount: { value: 12, unit: 'kJ/m2' }, time_before_obs: { value: 1, unit: 'h' } },
      ]);
    });

    it('stops reading radiation when the kind does not increase', () => {
      const reader = new GroupReader('30456 20123');
      const report: SynopReport = {};
      section3Handlers[5]('55055', reader, report, landContext());
      expect(report.radiation?.map((entry) => entry.kind)).toEqual(['diffused_solar']);
      expect(reader.peek()).toBe('20123');
    });

    it('keeps a second sunshine group and its radiation undecoded', () => {
      const { report, notImplemented } = decodeGroups('55055 55100 20123');
      expect(report.sunshine?.amount).toEqual({ value: 5.5, unit: 'h' });
      expect(notImplemented).toEqual(['55100', '20123']);
    });

    it('records unavailable sunshine as null', () => {
      expect(decodeGroups('55///').report.sunshine).toBeNull();
    });
  });

  describe('groups 6 to 8', () => {
    it('decodes 24-hour precipitation from a 7-group', () => {
      expect(decodeGroups('70123').report.precipitation_s3).toEqual({
        amount: { value: 12.3, quantifier: null, trace: false, unit: 'mm', _table: '3590A', _code: 123 },
        time_before_obs: { value: 24, unit: 'h' },
      });
    });

    it('collects cloud layers', () => {
      expect(decodeGroups('82360 85815').report.cloud_layer).toEqual([
        {
          cloud_cover: { value: 2, obscured: false, unit: 'okta', _table: '2700', _code: 2 },
          genus: { value: 'Ac', _table: '0500', _code: 3 },
          cloud_height: { value: 3000, quantifier: null, use90: false, unit: 'm', _table: '1677', _code: 60 },
        },
        {
          cloud_cover: { value: 5, obscured: false, unit: 'okta', _table: '2700', _code: 5 },
          genus: { value: 'Cu', _table: '0500', _code: 8 },
          cloud_height: { value: 450, quantifier: null, use90: false, unit: 'm', _table: '1677', _code: 15 },
        },
      ]);
    });
  });

  describe('group 9', () => {
    it('attaches the 907 period and the 915 direction to gusts', () => {
      const { report } = decodeGroups('90710 91120 91509 91035');
      expect(report.highest_gust).toEqual([
        {
          speed: { value: 20, unit: 'KT' },
          time_before_obs: { value: 60, unit: 'min' },
          direction: { value: 90, calm: false, varAllUnknown: false, unit: 'deg', _table: '0877', _code: 9 },
        },
        { speed: { value: 35, unit: 'KT' }, measure_period: { value: 10, unit: 'min' } },
      ]);
    });

    it('decodes visibility towards the sea and sudden changes', () => {
      const { report } = decodeGroups('98075 99705 99810');
      expect(report.visibility_direction).toEqual([{
        direction: { value: 'towardsSea', _table: '0700', _code: 0 },
        visibility: { value: 25000, quantifier: null, use90: false, unit: 'm', _table: '4377', _code: 75 },
      }]);
      expect(report.sudden_temperature_change).toEqual({ value: -5, unit: 'Cel' });
      expect(report.sudden_humidity_change).toEqual({ value: 10, unit: '%' });
    });

    it('decodes deposits and snow fall', () => {
      const { report } = decodeGroups('93412 93197');
      expect(report.deposit_diameter).toEqual({
        deposit_type: 'glaze',
        diameter: { value: 12, quantifier: null, non_measurable: false, impossible: false, unit: 'mm', _table: '3570', _code: 12 },
      });
      expect(report.snow_fall).toEqual({
        amount: { value: 1, quantifier: 'isLess', inaccurate: false, unit: 'mm', _table: '3870', _code: 97 },
      });
    });

    it('records each 907 period with the group that follows it', () => {
      const { report } = decodeGroups('90710 90923 91120 90760');
      expect(report.time_periods).toEqual([
        { period: { value: 60, unit: 'min' }, followed_by: '909' },
        { period: { value: 360, unit: 'min' }, followed_by: null },
      ]);
    });

    it('keeps a repeated single-valued group undecoded', () => {
      const { report, notImplemented } = decodeGroups('99612 99705');
      expect(report.sudden_temperature_change).toEqual({ value: 12, unit: 'Cel' });
      expect(notImplemented).toEqual(['99705']);
    });

    it('leaves unsupported codes and orphan directions undecoded', () => {
      expect(decodeGroups('91299 91509').notImplemented).toEqual(['91299', '91509']);
    });
  });

  describe('samePeriod', () => {
    it('compares periods field by field', () => {
      expect(samePeriod({ value: 6, unit: 'h' }, { value: 6, unit: 'h' })).toBe(true);
      expect(samePeriod({ value: 6, unit: 'h' }, { value: 360, unit: 'min' })).toBe(false);
      expect(samePeriod({ value: 6, unit: 'h' }, null)).toBe(false);
      expect(samePeriod(null, null)).toBe(true);
    });
  });

  describe('encoding', () => {
    it('re-encodes decoded groups unchanged', () => {
      const groups = '10178 21073 34101 50123 54315 55055 20123 30456 56123 57815 58012 60014 82360 85815 '
        + '90710 91120 91509 91035 98075 99612 99810';
      const { report } = decodeGroups(groups);
      expect(encodeSection3(report, encodeContext()).join(' ')).toBe(`333 ${groups}`);
    });

    it('re-encodes the Region I group', () => {
      const { report } = decodeGroups('02434', landContext({ region: 'I' }));
      expect(encodeSection3(report, encodeContext())).toEqual(['333', '02434']);
    });

    it('writes a 7-group for a 24-hour total without provenance', () => {
      const report: SynopReport = {
        precipitation_s3: {
          amount: { value: 12.3, quantifier: null, trace: false, unit: 'mm' },
          time_before_obs: { value: 24, unit: 'h' },
        },
      };
      expect(encodeSection3(report, encodeContext())).toEqual(['333', '70123']);
    });

    it('only repeats 907 when the period changes', () => {
      const report: SynopReport = {
        highest_gust: [{ speed: { value: 20, unit: 'KT' }, time_before_obs: { value: 60, unit: 'min' } }],
        snow_fall: {
          amount: { value: 10, quantifier: null, inaccurate: false, unit: 'mm' },
          time_before_obs: { value: 60, unit: 'min' },
        },
      };
      expect(encodeSection3(report, encodeContext())).toEqual(['333', '90710', '91120', '93101']);
    });

    it.each([
      ['a period that qualifies nothing', '90760'],
      ['a period ahead of 909', '90710 90923 91120'],
      ['consecutive periods', '90710 90760 91120'],
      ['a period for each gust', '90710 91120 90760 91135'],
    ])('puts recorded 907 groups back in place for %s', (_name, groups) => {
      const { report } = decodeGroups(groups);
      expect(encodeSection3(report, encodeContext()).join(' ')).toBe(`333 ${groups}`);
    });

    it('rejects gusts measured over a period other than ten minutes', () => {
      const report: SynopReport = {
        highest_gust: [{ speed: { value: 20, unit: 'KT' }, measure_period: { value: 5, unit: 'min' } }],
      };
      expect(() => encodeSection3(report, encodeContext())).toThrow(EncodeError);
    });

    it('detects reports with Section 3 content', () => {
      expect(hasSection3({ sunshine: null })).toBe(true);
      expect(hasSection3({ air_temperature: null })).toBe(false);
    });
  });
});
