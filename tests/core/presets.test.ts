import { describe, test, expect } from 'vitest';
import { StaticPresetResolver, listPresets, resolvePreset } from '../../core/presets';

describe('StaticPresetResolver', () => {
  const resolver = new StaticPresetResolver({ Zeta: ['#z'], alpha: ['#a1', '#a2'] });

  test('should resolve names case-insensitively', () => {
    expect(resolver.resolve('ALPHA')).toEqual(['#a1', '#a2']);
    expect(resolver.resolve(' zeta ')).toEqual(['#z']);
  });

  test('should return undefined for an unknown preset', () => {
    expect(resolver.resolve('missing')).toBeUndefined();
  });

  test('should list lower-cased names in order', () => {
    expect(resolver.list()).toEqual(['alpha', 'zeta']);
  });

  test('should freeze the term lists', () => {
    expect(Object.isFrozen(resolver.resolve('alpha'))).toBe(true);
  });
});

describe('bundled presets', () => {
  test('should ship the fabry and glp1 presets', () => {
    expect(listPresets()).toEqual(['fabry', 'glp1']);
  });

  test('should resolve hashtags for each preset', () => {
    expect(resolvePreset('fabry')).toContain('#Fabry');
    expect(resolvePreset('glp1')).toContain('#GLP1');
  });
});
