import { describe, it, expect, vi } from 'vitest';
import { HttpExtractionService, parseRetryAfter } from '../../../src/infrastructure/extraction/HttpExtractionService.js';
import type { ExtractionContext } from '../../../src/domain/ports/ExtractionService.js';
import { PermanentError, TransientError } from '../../../src/domain/errors/PipelineErrors.js';

function context(): ExtractionContext {
  return { jobId: 'job-1', batchId: 'job-1:000002', batchIndex: 2, attempt: 1, signal: new AbortController().signal };
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' }, ...init });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('HttpExtractionService', () => {
  it('should post the batch and return the records', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ records: [{ sku: 'A-1', price: 9.99 }] }));
    const service = new HttpExtractionService({
      endpoint: 'https://extractor.example.test/extract',
      headers: { authorization: 'Bearer test-secret' },
      fetchFn,
    });

    const records = await service.extract(['https://shop.example.test/a'], context());

    expect(records).toEqual([{ sku: 'A-1', price: 9.99 }]);
    expect(fetchFn).toHaveBeenCalledOnce();
    const [url, init] = fetchFn.mock.calls[0] ?? [undefined, undefined];
    expect(url).toBe('https://extractor.example.test/extract');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'content-type': 'application/json',
      accept: 'application/json',
      authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      jobId: 'job-1',
      batchIndex: 2,
      targets: ['https://shop.example.test/a'],
    });
  });

  it('should treat network errors as transient', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const service = new HttpExtractionService({ endpoint: 'https://extractor.example.test', fetchFn });

    const error = await captureError(service.extract(['a'], context()));

    expect(error).toBeInstanceOf(TransientError);
    expect(error).toHaveProperty('message', 'Extraction request failed: fetch failed');
  });

  it('should treat 5xx and 429 answers as transient and honour Retry-After', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'retry-after': '7' } }));
    const service = new HttpExtractionService({ endpoint: 'https://extractor.example.test', fetchFn });

    const first = await captureError(service.extract(['a'], context()));
    const second = await captureError(service.extract(['a'], context()));

    expect(first).toBeInstanceOf(TransientError);
    expect(first).toHaveProperty('message', 'Extraction endpoint answered 503 Service Unavailable');
    expect(second).toBeInstanceOf(TransientError);
    expect(second).toHaveProperty('retryAfterMs', 7000);
  });

  it('should treat other 4xx answers as permanent', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('nope', { status: 404 }));
    const service = new HttpExtractionService({ endpoint: 'https://extractor.example.test', fetchFn });

    const error = await captureError(service.extract(['a'], context()));

    expect(error).toBeInstanceOf(PermanentError);
    expect(error).toHaveProperty('message', 'Extraction endpoint answered 404');
  });

  it('should treat a body that is not JSON as permanent', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>', { status: 200 }));
    const service = new HttpExtractionService({ endpoint: 'https://extractor.example.test', fetchFn });

    await expect(service.extract(['a'], context())).rejects.toThrow(PermanentError);
  });

  it('should treat a body without a records array as permanent', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ items: [] }));
    const service = new HttpExtractionService({ endpoint: 'https://extractor.example.test', fetchFn });

    await expect(service.extract(['a'], context())).rejects.toThrow(
      /^Extraction response has an unexpected shape/,
    );
  });
});

describe('parseRetryAfter', () => {
  const now = Date.parse('2024-03-01T12:00:00.000Z');

  it('should read delta-seconds', () => {
    expect(parseRetryAfter('120', now)).toBe(120_000);
  });

  it('should read an HTTP date', () => {
    expect(parseRetryAfter('Fri, 01 Mar 2024 12:00:30 GMT', now)).toBe(30_000);
  });

  it('should never return a negative delay', () => {
    expect(parseRetryAfter('Fri, 01 Mar 2024 11:00:00 GMT', now)).toBe(0);
  });

  it('should ignore missing or unreadable values', () => {
    expect(parseRetryAfter(null, now)).toBeUndefined();
    expect(parseRetryAfter('', now)).toBeUndefined();
    expect(parseRetryAfter('soon', now)).toBeUndefined();
  });
});
