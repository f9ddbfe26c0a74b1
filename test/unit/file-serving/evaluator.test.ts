import assert from 'assert';
import { applyPlan, evaluateRequest } from '../../../src/file-serving/evaluator.ts';
import { createMemoryResponse } from '../../lib/memory-response.ts';

const ETAG = '0123456789abcdef0123456789abcdef01234567';

function evaluate(rangeHeader: string | undefined, ifNoneMatch: string | undefined, size = 500) {
  let etagCalls = 0;
  const plan = evaluateRequest({
    size,
    rangeHeader,
    ifNoneMatch,
    etag: () => {
      etagCalls++;
      return ETAG;
    },
  });
  return { plan, etagCalls };
}

describe('file-serving/evaluator', () => {
  describe('evaluateRequest()', () => {
    it('plans full content without conditional headers', () => {
      const { plan } = evaluate(undefined, undefined);
      assert.deepStrictEqual(plan, { type: 'full', range: { lower: 0, upper: 500 }, etag: ETAG });
    });

    it('plans not-modified when If-None-Match equals the ETag', () => {
      const { plan } = evaluate(undefined, ETAG);
      assert.deepStrictEqual(plan, { type: 'not-modified' });
    });

    it('plans full content when If-None-Match differs', () => {
      const { plan } = evaluate(undefined, `"${ETAG}"`);
      assert.strictEqual(plan.type, 'full');
    });

    it('plans a partial response for one valid range', () => {
      const { plan, etagCalls } = evaluate('bytes=100-', undefined);
      assert.deepStrictEqual(plan, { type: 'partial', range: { lower: 100, upper: 500 } });
      assert.strictEqual(etagCalls, 0);
    });

    it('lets a valid range win over a matching If-None-Match', () => {
      const { plan } = evaluate('bytes=0-9', ETAG);
      assert.deepStrictEqual(plan, { type: 'partial', range: { lower: 0, upper: 10 } });
    });

    it('plans multi-range for two or more sub-ranges', () => {
      const { plan } = evaluate('bytes=0-3/10-15', undefined);
      assert.deepStrictEqual(plan, { type: 'multi-range', count: 2 });
    });

    it('treats a range header with nothing parsable as absent', () => {
      const { plan } = evaluate('bytes=abc', undefined);
      assert.strictEqual(plan.type, 'full');
    });

    it('checks If-None-Match when the range header has nothing parsable', () => {
      const { plan } = evaluate('bytes=abc', ETAG);
      assert.deepStrictEqual(plan, { type: 'not-modified' });
    });

    it('clamps an upper bound past the end of the file', () => {
      const { plan } = evaluate('bytes=490-999', undefined);
      assert.deepStrictEqual(plan, { type: 'partial', range: { lower: 490, upper: 500 } });
    });

    it('marks a range starting at the file size as unsatisfiable', () => {
      const { plan } = evaluate('bytes=500-', undefined);
      assert.deepStrictEqual(plan, { type: 'unsatisfiable' });
    });

    it('marks an inverted range as unsatisfiable', () => {
      const { plan } = evaluate('bytes=9-3', undefined);
      assert.deepStrictEqual(plan, { type: 'unsatisfiable' });
    });

    it('marks any range on an empty file as unsatisfiable', () => {
      const { plan } = evaluate('bytes=0-', undefined, 0);
      assert.deepStrictEqual(plan, { type: 'unsatisfiable' });
    });
  });

  describe('applyPlan()', () => {
    const context = { size: 500, contentType: 'text/plain' };

    it('writes 206 headers and returns the range', () => {
      const response = createMemoryResponse();
      const range = applyPlan(response, { type: 'partial', range: { lower: 100, upper: 500 } }, context);

      assert.deepStrictEqual(range, { lower: 100, upper: 500 });
      assert.strictEqual(response.status, 206);
      assert.deepStrictEqual(Object.fromEntries(response.headers), {
        'accept-ranges': 'bytes',
        'content-length': '400',
        'content-type': 'text/plain',
        'content-range': 'bytes 100-499/500',
      });
    });

    it('writes 200 headers with the ETag', () => {
      const response = createMemoryResponse();
      const range = applyPlan(response, { type: 'full', range: { lower: 0, upper: 500 }, etag: ETAG }, context);

      assert.deepStrictEqual(range, { lower: 0, upper: 500 });
      assert.strictEqual(response.status, 200);
      assert.deepStrictEqual(Object.fromEntries(response.headers), {
        'accept-ranges': 'bytes',
        'content-type': 'text/plain',
        'content-length': '500',
        etag: ETAG,
      });
    });

    it('writes a bare 304', () => {
      const response = createMemoryResponse();
      assert.strictEqual(applyPlan(response, { type: 'not-modified' }, context), undefined);
      assert.strictEqual(response.status, 304);
      assert.strictEqual(response.headers.size, 0);
    });

    it('writes a bare 500 for multi-range', () => {
      const response = createMemoryResponse();
      assert.strictEqual(applyPlan(response, { type: 'multi-range', count: 2 }, context), undefined);
      assert.strictEqual(response.status, 500);
      assert.strictEqual(response.headers.size, 0);
    });

    it('writes 416 with the unsatisfied Content-Range', () => {
      const response = createMemoryResponse();
      assert.strictEqual(applyPlan(response, { type: 'unsatisfiable' }, context), undefined);
      assert.strictEqual(response.status, 416);
      assert.strictEqual(response.headers.get('content-range'), 'bytes */500');
    });
  });
});
