import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { FetchTransport } from '../transport';

const URL_UNDER_TEST = 'https://monitoringapi.solaredge.com/sites/list?api_key=test-secret';

describe('FetchTransport', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('resolves with status and body text', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('{"sites":{}}', { status: 200 }));

    await expect(new FetchTransport().get(URL_UNDER_TEST)).resolves.toEqual({
      status: 200,
      body: '{"sites":{}}',
    });
  });

  it('resolves for non-2xx statuses too', async () => {
    jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('{"message":"Invalid API key"}', { status: 403 }));

    await expect(new FetchTransport().get(URL_UNDER_TEST)).resolves.toEqual({
      status: 403,
      body: '{"message":"Invalid API key"}',
    });
  });

  it('sends a GET accepting JSON, merged with extra headers', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('{}'));

    await new FetchTransport({ headers: { 'User-Agent': 'test-agent' } }).get(URL_UNDER_TEST);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(URL_UNDER_TEST);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'User-Agent': 'test-agent' });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('rejects when fetch fails', async () => {
    jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    await expect(new FetchTransport().get(URL_UNDER_TEST)).rejects.toThrow('fetch failed');
  });

  it('aborts the request after the timeout', async () => {
    jest.spyOn(globalThis, 'fetch').mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('request aborted')));
        }),
    );

    await expect(new FetchTransport({ timeoutMs: 10 }).get(URL_UNDER_TEST)).rejects.toThrow(
      'request aborted',
    );
  });

  it('does not abort a request that finished in time', async () => {
    let signal: AbortSignal | null | undefined;
    jest.spyOn(globalThis, 'fetch').mockImplementation(async (_input, init) => {
      signal = init?.signal;
      return new Response('{}');
    });

    await new FetchTransport({ timeoutMs: 10 }).get(URL_UNDER_TEST);
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(signal?.aborted).toBe(false);
  });
});
