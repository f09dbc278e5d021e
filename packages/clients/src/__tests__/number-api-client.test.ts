import { afterEach, describe, expect, it, vi } from 'vitest';
import { ParseFailure, UpstreamFailure } from '@otp-relay/domain';
import { NumberApiClient } from '../number-api-client.js';

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('number api client', () => {
  it('posts the range with the api key header', async () => {
    const fetchMock = stubFetch(new Response(JSON.stringify({ data: { number: '8801799999' } })));
    const client = new NumberApiClient('https://numbers.test/', 'test-key');

    const body = await client.requestNumber({ range: '88017XXX', is_national: null, remove_plus: null });

    expect(body).toEqual({ data: { number: '8801799999' } });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://numbers.test/mapi/v1/mdashboard/getnum/number');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'content-type': 'application/json', mapikey: 'test-key' });
    expect(init?.body).toBe('{"range":"88017XXX","is_national":null,"remove_plus":null}');
  });

  it('raises an upstream failure on a non-success status', async () => {
    stubFetch(new Response('quota exceeded', { status: 429 }));
    const client = new NumberApiClient('https://numbers.test', 'test-key');

    const error = await client
      .requestNumber({ range: '88017XXX', is_national: null, remove_plus: null })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamFailure);
    expect(error).toMatchObject({ code: 'number_api_failed', upstreamStatus: 429 });
  });

  it('raises an upstream failure when the request itself fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));
    const client = new NumberApiClient('https://numbers.test', 'test-key');

    await expect(
      client.requestNumber({ range: '1XXX', is_national: null, remove_plus: null })
    ).rejects.toMatchObject({ code: 'number_api_unreachable', message: 'fetch failed' });
  });

  it('raises a parse failure for a non-json body', async () => {
    stubFetch(new Response('<html>oops</html>'));
    const client = new NumberApiClient('https://numbers.test', 'test-key');

    const error = await client
      .requestNumber({ range: '1XXX', is_national: null, remove_plus: null })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ParseFailure);
    expect(error).toMatchObject({ responseBody: '<html>oops</html>' });
  });

  it('queries allocation info with all parameters', async () => {
    const fetchMock = stubFetch(new Response('{"rows":[]}'));
    const client = new NumberApiClient('https://numbers.test', 'test-key');

    const text = await client.fetchInfo({ date: '2024-05-01', page: '2', search: '', status: 'success' });

    expect(text).toBe('{"rows":[]}');
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://numbers.test/mapi/v1/mdashboard/getnum/info?date=2024-05-01&page=2&search=&status=success'
    );
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('GET');
  });
});
