import { describe, expect, it } from 'vitest';
import { formatTagWithComma, normalizeTag, parseTag, tagFromParts, tagSortKey } from '../src/utils/tagUtils';
import { getTagName, TAGS } from '../src/core/tags';

describe('tag utilities', () => {
  it('normalizes tags into x-prefixed format', () => {
    expect(normalizeTag('0010,0010')).toBe('x00100010');
    expect(normalizeTag('X0020000D')).toBe('x0020000d');
    expect(normalizeTag('(0018,0050)')).toBe('x00180050');
  });

  it('formatTagWithComma adds a comma when the clean tag has 8 characters', () => {
    expect(formatTagWithComma('x7fe00010')).toBe('7FE0,0010');
    expect(formatTagWithComma('00100010')).toBe('0010,0010');
    expect(formatTagWithComma('x1030')).toBe('1030');
  });

  it('splits and rebuilds group/element pairs', () => {
    expect(parseTag('x0020000D')).toEqual({ group: 0x0020, element: 0x000d });
    expect(parseTag('0010,0010')).toBeNull();
    expect(parseTag('x001000')).toBeNull();
    expect(tagFromParts(0xfffe, 0xe000)).toBe('xfffee000');
  });

  it('orders by group before element', () => {
    const a = tagSortKey({ group: 0x0008, element: 0xffff });
    const b = tagSortKey({ group: 0x0010, element: 0x0000 });
    expect(a).toBeLessThan(b);
    expect(tagSortKey({ group: 0x7fe0, element: 0x0010 })).toBe(0x7fe00010);
  });

  it('resolves dictionary names', () => {
    expect(getTagName(TAGS.PatientName.tag)).toBe("Patient's Name");
    expect(getTagName('X7FE00010')).toBe('Pixel Data');
    expect(getTagName('x00991000')).toBe('Unknown Tag (x00991000)');
  });
});
