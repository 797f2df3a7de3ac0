import config, { resolveBooleanFlag } from '..';

describe('config', () => {
  describe('resolveBooleanFlag', () => {
    it('prefers the enable variable when it is set', () => {
      expect(resolveBooleanFlag('true', 'true', false)).toBe(true);
      expect(resolveBooleanFlag('false', undefined, true)).toBe(false);
    });

    it('falls back to the inverse of the disable variable', () => {
      expect(resolveBooleanFlag(undefined, 'true', true)).toBe(false);
      expect(resolveBooleanFlag(undefined, 'false', false)).toBe(true);
    });

    it('uses the default when neither variable is set', () => {
      expect(resolveBooleanFlag(undefined, undefined, true)).toBe(true);
      expect(resolveBooleanFlag(undefined, undefined, false)).toBe(false);
    });
  });

  it('runs under the test environment with the documented defaults', () => {
    expect(config.env).toBe('test');
    expect(config.decoder.recordSkippedGroups).toBe(true);
    expect(config.encoder).toEqual({ useVisibility90: false, useCloudHeight90: false });
  });
});
