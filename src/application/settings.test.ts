import { describe, expect, it } from 'vitest';

import { DEFAULT_SETTINGS, isTocPosition, mergeOutlineSettings } from './settings';

describe('settings', () => {
  it('returns defaults for missing input', () => {
    expect(mergeOutlineSettings(undefined)).toEqual(DEFAULT_SETTINGS);
    expect(mergeOutlineSettings(null)).toEqual(DEFAULT_SETTINGS);
    expect(mergeOutlineSettings(['left'])).toEqual(DEFAULT_SETTINGS);
  });

  it('keeps valid values', () => {
    expect(
      mergeOutlineSettings({
        tocPosition: 'right',
        tocMaxLevel: 3,
        tocCollapsedByDefault: true,
        fixCodeBlocks: false,
      })
    ).toEqual({
      tocPosition: 'right',
      tocMaxLevel: 3,
      tocCollapsedByDefault: true,
      fixCodeBlocks: false,
    });
  });

  it('sanitizes malformed values field by field', () => {
    const merged = mergeOutlineSettings({
      tocPosition: 'top',
      tocMaxLevel: 'deep',
      tocCollapsedByDefault: 'yes',
      fixCodeBlocks: true,
    });

    expect(merged).toEqual({
      ...DEFAULT_SETTINGS,
      fixCodeBlocks: true,
    });
  });

  it('clamps and rounds the toc level', () => {
    expect(mergeOutlineSettings({ tocMaxLevel: 9 }).tocMaxLevel).toBe(6);
    expect(mergeOutlineSettings({ tocMaxLevel: 0 }).tocMaxLevel).toBe(1);
    expect(mergeOutlineSettings({ tocMaxLevel: 2.6 }).tocMaxLevel).toBe(3);
    expect(mergeOutlineSettings({ tocMaxLevel: Number.NaN }).tocMaxLevel).toBe(6);
  });

  it('recognizes toc positions', () => {
    expect(isTocPosition('left')).toBe(true);
    expect(isTocPosition('right')).toBe(true);
    expect(isTocPosition('center')).toBe(false);
    expect(isTocPosition(1)).toBe(false);
  });
});
