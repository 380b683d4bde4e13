jest.mock('../lib/net/httpClient', () => ({
  httpGet: jest.fn(),
}));

import { check, checkUrl, decodeBody, extractTitle } from '../lib/checker';
import { httpGet, HttpResponse } from '../lib/net/httpClient';
import { HttpRequestError } from '../lib/net/errors';

const mockHttpGet = httpGet as jest.MockedFunction<typeof httpGet>;
const now = () => new Date('2025-01-02T03:04:05.000Z');

function page(
  finalUrl: string,
  status = 200,
  html = '<html><head><TITLE> Portal Ciudadano </TITLE></head></html>',
  headers: Record<string, string> = { server: 'nginx/1.18.0', 'content-type': 'text/html; charset=utf-8' },
): HttpResponse {
  return { status, finalUrl, headers, body: Buffer.from(html, 'utf8') };
}

describe('extractTitle', () => {
  test('finds the first title case-insensitively and trims it', () => {
    expect(extractTitle('<TiTlE>\n  First </tItLe><title>Second</title>')).toBe('First');
  });

  test('returns empty string when there is no title pair', () => {
    expect(extractTitle('<html><body>no title</body></html>')).toBe('');
    expect(extractTitle('<title>unterminated')).toBe('');
  });

  test('caps the title at 200 characters', () => {
    const title = extractTitle(`<title>${'x'.repeat(250)}</title>`);
    expect(title).toHaveLength(200);
  });
});

describe('decodeBody', () => {
  test('uses the charset from the content type', () => {
    const body = Buffer.from([0x63, 0x61, 0x66, 0xe9]);
    expect(decodeBody(body, 'text/html; charset=ISO-8859-1')).toBe('café');
  });

  test('falls back to utf-8 for unknown charsets', () => {
    expect(decodeBody(Buffer.from('hola', 'utf8'), 'text/html; charset=x-not-a-charset')).toBe('hola');
  });
});

describe('checkUrl', () => {
  beforeEach(() => jest.resetAllMocks());

  test('builds a probe result from a successful exchange', async () => {
    const res = page('https://a.example.cu/');
    mockHttpGet.mockResolvedValueOnce(res);

    const outcome = await checkUrl('https://a.example.cu/', { now });

    expect(outcome).toEqual({
      kind: 'result',
      result: {
        url: 'https://a.example.cu/',
        statusCode: 200,
        finalUrl: 'https://a.example.cu/',
        title: 'Portal Ciudadano',
        contentLength: res.body.length,
        server: 'nginx/1.18.0',
        contentType: 'text/html; charset=utf-8',
        discoveredAt: '2025-01-02T03:04:05.000Z',
        domain: 'a.example.cu',
      },
    });
  });

  test('reports missing headers as Unknown', async () => {
    mockHttpGet.mockResolvedValueOnce(page('https://a.example.cu/robots.txt', 200, 'User-agent: *', {}));

    const result = await check('https://a.example.cu/robots.txt', { now });

    expect(result?.server).toBe('Unknown');
    expect(result?.contentType).toBe('Unknown');
    expect(result?.title).toBe('');
  });

  test('returns non-2xx exchanges as results', async () => {
    mockHttpGet.mockResolvedValueOnce(page('https://a.example.cu/admin', 403));

    const result = await check('https://a.example.cu/admin');
    expect(result?.statusCode).toBe(403);
  });

  test('takes the resolved host from the final URL after redirects', async () => {
    mockHttpGet.mockResolvedValueOnce(page('https://www.a.example.cu:8443/inicio'));

    const result = await check('https://a.example.cu/');
    expect(result?.url).toBe('https://a.example.cu/');
    expect(result?.finalUrl).toBe('https://www.a.example.cu:8443/inicio');
    expect(result?.domain).toBe('www.a.example.cu:8443');
  });

  test('retries over http once when https fails with a TLS error', async () => {
    mockHttpGet
      .mockRejectedValueOnce(new HttpRequestError('tls', 'write EPROTO', 'EPROTO'))
      .mockResolvedValueOnce(page('http://a.example.cu/admin'));

    const outcome = await checkUrl('https://a.example.cu/admin');

    expect(mockHttpGet.mock.calls.map((c) => c[0])).toEqual([
      'https://a.example.cu/admin',
      'http://a.example.cu/admin',
    ]);
    expect(outcome.kind).toBe('result');
    expect(outcome.kind === 'result' && outcome.result.url).toBe('http://a.example.cu/admin');
  });

  test('does not fall back twice when the http retry also fails', async () => {
    mockHttpGet
      .mockRejectedValueOnce(new HttpRequestError('tls', 'handshake failure', 'ERR_SSL_WRONG_VERSION_NUMBER'))
      .mockRejectedValueOnce(new HttpRequestError('refused', 'connect ECONNREFUSED', 'ECONNREFUSED'));

    const outcome = await checkUrl('https://a.example.cu/');

    expect(mockHttpGet).toHaveBeenCalledTimes(2);
    expect(outcome).toEqual({
      kind: 'failure',
      url: 'http://a.example.cu/',
      reason: 'refused',
      message: 'connect ECONNREFUSED',
      fallbackFrom: 'https://a.example.cu/',
    });
  });

  test('does not retry a TLS error on an http URL', async () => {
    mockHttpGet.mockRejectedValueOnce(new HttpRequestError('tls', 'unexpected TLS record'));

    const outcome = await checkUrl('http://a.example.cu/');

    expect(mockHttpGet).toHaveBeenCalledTimes(1);
    expect(outcome.kind === 'failure' && outcome.reason).toBe('tls');
  });

  test('absorbs other transport failures as absent results', async () => {
    mockHttpGet.mockRejectedValueOnce(new HttpRequestError('dns', 'getaddrinfo ENOTFOUND gone.example.cu', 'ENOTFOUND'));

    const outcome = await checkUrl('https://gone.example.cu/');
    expect(outcome).toEqual({
      kind: 'failure',
      url: 'https://gone.example.cu/',
      reason: 'dns',
      message: 'getaddrinfo ENOTFOUND gone.example.cu',
    });
    expect(mockHttpGet).toHaveBeenCalledTimes(1);

    mockHttpGet.mockRejectedValueOnce(new HttpRequestError('timeout', 'timeout of 10000ms exceeded'));
    await expect(check('https://slow.example.cu/')).resolves.toBeNull();
  });
});
