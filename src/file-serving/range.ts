import type { ByteRange } from './types.ts';

const RANGE_UNIT = 'bytes';
const SUB_RANGE_SEPARATOR = /[/,]/;
const SUB_RANGE_PATTERN = /^(\d*)-(\d*)$/;

/**
 * Parse a Range header into half-open intervals
 *
 * Sub-ranges are separated by '/' or ','. A malformed sub-range is dropped rather than
 * failing the whole header, so the result may be shorter than the number of sub-ranges.
 * Bounds are not checked against size here.
 *
 * @example
 * parseRangeHeader('bytes=0-3/10-15', 500)
 * // => [{ lower: 0, upper: 4 }, { lower: 10, upper: 16 }]
 *
 * @example
 * parseRangeHeader('bytes=abc/5-10', 500)
 * // => [{ lower: 5, upper: 11 }]
 */
export function parseRangeHeader(header: string, size: number): ByteRange[] {
  const parts = header.split('=');
  if (parts.length !== 2 || parts[0]?.trim() !== RANGE_UNIT || parts[1] === undefined) {
    return [];
  }

  const ranges: ByteRange[] = [];
  for (const text of parts[1].split(SUB_RANGE_SEPARATOR)) {
    const range = parseOneRange(text, size);
    if (range) ranges.push(range);
  }
  return ranges;
}

/**
 * Parse one sub-range
 *
 * - `L-U` => [L, U + 1) (the wire format's upper bound is inclusive)
 * - `L-`  => [L, size)
 * - `-N`  => the last N bytes
 *
 * The suffix form goes beyond the two-form `L-U` / `L-` grammar on purpose: it follows
 * RFC 9110 instead of reading `-N` as the open-ended `N-`.
 *
 * @returns undefined when the text is not one of those forms
 */
export function parseOneRange(text: string, size: number): ByteRange | undefined {
  const match = SUB_RANGE_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const [, lowerText = '', upperText = ''] = match;
  const lower = toOffset(lowerText);
  const upper = toOffset(upperText);

  if (lower === undefined) {
    if (lowerText !== '') return undefined;
    // suffix form; '-0' asks for nothing
    if (upper === undefined || upper === 0) return undefined;
    return { lower: Math.max(size - upper, 0), upper: size };
  }

  if (upper === undefined) {
    if (upperText !== '') return undefined;
    return { lower, upper: size };
  }

  return { lower, upper: upper + 1 };
}

function toOffset(digits: string): number | undefined {
  if (digits === '') return undefined;
  const value = Number(digits);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function rangeLength(range: ByteRange): number {
  return range.upper - range.lower;
}

/** Content-Range value for a satisfied range, e.g. `bytes 100-499/500` */
export function formatContentRange(range: ByteRange, size: number): string {
  return `${RANGE_UNIT} ${range.lower}-${range.upper - 1}/${size}`;
}

/** Content-Range value for a 416 response: the unit, an asterisk and the full size */
export function formatUnsatisfiedRange(size: number): string {
  return `${RANGE_UNIT} */${size}`;
}
