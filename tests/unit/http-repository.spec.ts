import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { fetchSafe } from '../../src/lib/http/fetchSafe';
import { HttpModelRepository } from '../../src/lib/resources/http-repository';

const fetchMock = vi.fn<typeof fetch>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HttpModelRepository', () => {
  const repository = new HttpModelRepository({ baseUrl: 'http://127.0.0.1:7860/' });

  it('loads a model and returns its handle', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ handle: 'h-1' }), { status: 200 }));

    await expect(repository.load('sdxl-base')).resolves.toEqual({ handle: 'h-1', resourceId: 'sdxl-base' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://127.0.0.1:7860/models/load');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'sdxl-base' });
  });

  it('fails when the runtime refuses the model', async () => {
    fetchMock.mockResolvedValueOnce(new Response('out of memory', { status: 507 }));

    await expect(repository.load('sdxl-xl')).rejects.toThrow('runtime refused to load sdxl-xl (507)');
  });

  it('unloads by handle', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await repository.unload({ handle: 'h-1', resourceId: 'sdxl-base' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://127.0.0.1:7860/models/unload');
    expect(JSON.parse(String(init?.body))).toEqual({ handle: 'h-1' });
  });
});

describe('fetchSafe', () => {
  it('retries network errors and returns the first response', async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));

    const response = await fetchSafe('https://provider.test/ping', { retries: 1, retryDelayMs: 1 });

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry HTTP error statuses', async () => {
    fetchMock.mockResolvedValueOnce(new Response('nope', { status: 500 }));

    const response = await fetchSafe('https://provider.test/ping', { retries: 3, retryDelayMs: 1 });

    expect(response.status).toBe(500);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last retry', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(fetchSafe('https://provider.test/ping', { retries: 2, retryDelayMs: 1 })).rejects.toThrow('fetch failed');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('stops retrying once the caller aborts', async () => {
    const controller = new AbortController();
    fetchMock.mockImplementation(async () => {
      controller.abort();
      throw new DOMException('This operation was aborted', 'AbortError');
    });

    await expect(
      fetchSafe('https://provider.test/ping', { retries: 5, retryDelayMs: 1, signal: controller.signal })
    ).rejects.toThrow('This operation was aborted');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('sends the correlation id header', async () => {
    fetchMock.mockResolvedValueOnce(new Response('ok', { status: 200 }));

    await fetchSafe('https://provider.test/ping', { correlationId: 'abc123' });

    expect(new Headers(fetchMock.mock.calls[0][1]?.headers).get('x-correlation-id')).toBe('abc123');
  });
});
