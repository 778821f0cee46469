/**
 * Tag Utilities: Tag format normalization and conversion
 */

export interface TagParts {
  group: number;
  element: number;
}

const TAG_PATTERN = /^x[0-9a-f]{8}$/;

/**
 * Normalize tag format to lower-case x-prefixed format (e.g., "x0020000d")
 */
export function normalizeTag(tag: string): string {
  const cleanTag = tag.replace(/^x/i, '').replace(/,/g, '').replace(/[()]/g, '');
  return `x${cleanTag.toLowerCase()}`;
}

/**
 * Format tag with comma (e.g., "0010,0010")
 */
export function formatTagWithComma(tag: string): string {
  const cleanTag = tag.replace(/^x/i, '').replace(/,/g, '').replace(/[()]/g, '').toUpperCase();
  if (cleanTag.length === 8) {
    return `${cleanTag.slice(0, 4)},${cleanTag.slice(4, 8)}`;
  }
  return cleanTag;
}

/**
 * Split an x-prefixed tag into group and element numbers.
 * Returns null when the tag is not in xGGGGEEEE form.
 */
export function parseTag(tag: string): TagParts | null {
  const normalized = tag.toLowerCase();
  if (!TAG_PATTERN.test(normalized)) return null;
  return {
    group: parseInt(normalized.slice(1, 5), 16),
    element: parseInt(normalized.slice(5, 9), 16),
  };
}

/**
 * Build the x-prefixed form from group and element numbers
 */
export function tagFromParts(group: number, element: number): string {
  return `x${group.toString(16).padStart(4, '0')}${element.toString(16).padStart(4, '0')}`;
}

/**
 * Numeric sort key: group in the high 16 bits, element in the low 16 bits
 */
export function tagSortKey(parts: TagParts): number {
  return parts.group * 0x10000 + parts.element;
}
