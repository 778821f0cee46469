import { describe, expect, it } from 'vitest';
import { element, elements, getTagName, isTagKeyword, TAGS } from '../src/core/tags';

describe('tag dictionary', () => {
  it('builds elements with the dictionary VR', () => {
    expect(element('Rows', 512)).toEqual({ vr: 'US', Value: 512 });
    expect(element('PixelSpacing', ['0.5', '0.5'])).toEqual({ vr: 'DS', Value: ['0.5', '0.5'] });
  });

  it('keys datasets by tag and drops undefined values', () => {
    expect(
      elements({
        PatientName: 'DOE^JANE',
        SeriesNumber: 3,
        StudyDescription: undefined,
      })
    ).toEqual({
      x00100010: { vr: 'PN', Value: 'DOE^JANE' },
      x00200011: { vr: 'IS', Value: 3 },
    });
  });

  it('recognizes keywords', () => {
    expect(isTagKeyword('ReferencedFileID')).toBe(true);
    expect(isTagKeyword('toString')).toBe(false);
  });

  it('names tags case-insensitively', () => {
    expect(getTagName(TAGS.SeriesDescription.tag.toUpperCase())).toBe('Series Description');
    expect(getTagName('x99990001')).toBe('Unknown Tag (x99990001)');
  });
});
