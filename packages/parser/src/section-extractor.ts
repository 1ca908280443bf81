import { FieldMap, FieldValue } from './types.js';
import { coerceValue } from './value-coercer.js';

/** Marks a section that runs to the end of the text. */
export const END_OF_TEXT = Symbol('END_OF_TEXT');

export type SectionBoundary = string | RegExp;

/**
 * Return the text strictly between the first `start` boundary and the first
 * `end` boundary after it. A missing end boundary means the section runs to the
 * end of the text; a missing start boundary yields `null`.
 */
export function extractSection(
  text: string,
  start: SectionBoundary,
  end: SectionBoundary | typeof END_OF_TEXT,
): string | null {
  const startHit = findBoundary(text, start, 0);
  if (!startHit) return null;

  const from = startHit.index + startHit.length;
  if (end === END_OF_TEXT) return text.slice(from);

  const endHit = findBoundary(text, end, from);
  return endHit ? text.slice(from, endHit.index) : text.slice(from);
}

function findBoundary(
  text: string,
  boundary: SectionBoundary,
  fromIndex: number,
): { index: number; length: number } | null {
  if (typeof boundary === 'string') {
    const index = text.indexOf(boundary, fromIndex);
    return index === -1 ? null : { index, length: boundary.length };
  }

  const flags = boundary.flags.includes('g') ? boundary.flags : `${boundary.flags}g`;
  const re = new RegExp(boundary.source, flags);
  re.lastIndex = fromIndex;
  const match = re.exec(text);
  return match ? { index: match.index, length: match[0].length } : null;
}

export type ValueTransform = (key: string, value: FieldValue) => FieldValue;

/**
 * Parse `key : value` lines of an isolated block into a namespaced field map.
 * Splits on the first colon; both sides are trimmed.
 */
export function parseKeyValueBlock(
  block: string,
  prefix: string,
  transform?: ValueTransform,
  into: FieldMap = {},
): FieldMap {
  for (const line of block.split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const key = line.slice(0, colon).trim();
    if (!key) continue;

    const coerced = coerceValue(line.slice(colon + 1).trim());
    into[`${prefix}${key}`] = transform ? transform(key, coerced) : coerced;
  }
  return into;
}
