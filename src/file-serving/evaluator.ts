import type { HostResponse } from '../types.ts';
import { formatContentRange, formatUnsatisfiedRange, parseRangeHeader, rangeLength } from './range.ts';
import type { ByteRange, ResponsePlan } from './types.ts';

export interface EvaluateInput {
  size: number;
  rangeHeader: string | undefined;
  ifNoneMatch: string | undefined;
  /** Called only on the branches that need the ETag */
  etag: () => string;
}

/**
 * Decide the response shape for an opened file
 *
 * Order matters: a Range header is looked at first, so a valid single range wins over a
 * matching If-None-Match. A Range header that yields no parsable sub-range is treated as
 * absent.
 */
export function evaluateRequest({ size, rangeHeader, ifNoneMatch, etag }: EvaluateInput): ResponsePlan {
  if (rangeHeader !== undefined) {
    const ranges = parseRangeHeader(rangeHeader, size);
    if (ranges.length > 1) {
      return { type: 'multi-range', count: ranges.length };
    }
    const [range] = ranges;
    if (range) {
      return satisfy(range, size);
    }
  }

  if (ifNoneMatch !== undefined) {
    const current = etag();
    if (ifNoneMatch === current) {
      return { type: 'not-modified' };
    }
    return { type: 'full', range: { lower: 0, upper: size }, etag: current };
  }

  return { type: 'full', range: { lower: 0, upper: size }, etag: etag() };
}

// Upper bounds past the end are clamped; a start at or past the end cannot be served.
function satisfy(range: ByteRange, size: number): ResponsePlan {
  const upper = Math.min(range.upper, size);
  if (range.lower >= size || upper <= range.lower) {
    return { type: 'unsatisfiable' };
  }
  return { type: 'partial', range: { lower: range.lower, upper } };
}

export interface ApplyPlanContext {
  size: number;
  contentType: string;
}

/**
 * Write status and headers for a plan
 * @returns the byte range to stream, or undefined when the response has no body
 */
export function applyPlan(response: HostResponse, plan: ResponsePlan, { size, contentType }: ApplyPlanContext): ByteRange | undefined {
  switch (plan.type) {
    case 'partial':
      response.status = 206;
      response.setHeader('Accept-Ranges', 'bytes');
      response.setHeader('Content-Length', String(rangeLength(plan.range)));
      response.setHeader('Content-Type', contentType);
      response.setHeader('Content-Range', formatContentRange(plan.range, size));
      return plan.range;
    case 'full':
      response.status = 200;
      response.setHeader('Accept-Ranges', 'bytes');
      response.setHeader('Content-Type', contentType);
      response.setHeader('Content-Length', String(size));
      response.setHeader('ETag', plan.etag);
      return plan.range;
    case 'not-modified':
      response.status = 304;
      return undefined;
    case 'multi-range':
      // multipart/byteranges is not supported
      response.status = 500;
      return undefined;
    case 'unsatisfiable':
      response.status = 416;
      response.setHeader('Accept-Ranges', 'bytes');
      response.setHeader('Content-Range', formatUnsatisfiedRange(size));
      return undefined;
  }
}
