import { defaultSettings, parsePositiveInteger, resolveSettings } from '../src/config';

describe('resolveSettings', () => {
  it('starts from the defaults', () => {
    expect(resolveSettings({})).toEqual({ maxDepth: 64, useColors: true });
    expect(resolveSettings({})).not.toBe(defaultSettings);
  });

  it('reads the environment', () => {
    expect(resolveSettings({ SAFE_ARITH_MAX_DEPTH: '10' }).maxDepth).toBe(10);
    expect(resolveSettings({ NO_COLOR: '1' }).useColors).toBe(false);
    expect(resolveSettings({ NO_COLOR: '' }).useColors).toBe(true);
    expect(resolveSettings({ SAFE_ARITH_MAX_DEPTH: '' }).maxDepth).toBe(64);
  });

  it('lets overrides win over the environment', () => {
    const settings = resolveSettings({ SAFE_ARITH_MAX_DEPTH: '10', NO_COLOR: '1' }, { maxDepth: 5 });
    expect(settings).toEqual({ maxDepth: 5, useColors: false });
  });

  it('rejects invalid depth limits', () => {
    expect(() => resolveSettings({ SAFE_ARITH_MAX_DEPTH: 'abc' })).toThrow(
      "Invalid SAFE_ARITH_MAX_DEPTH: expected a positive integer, got 'abc'"
    );
    expect(() => resolveSettings({ SAFE_ARITH_MAX_DEPTH: '0' })).toThrow(/positive integer/);
    expect(() => resolveSettings({ SAFE_ARITH_MAX_DEPTH: '2.5' })).toThrow(/positive integer/);
  });
});

describe('parsePositiveInteger', () => {
  it('accepts padded digits', () => {
    expect(parsePositiveInteger(' 12 ', '--attempts')).toBe(12);
  });
});
