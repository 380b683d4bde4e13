import https from 'https';
import axios from 'axios';
import { CONFIG } from '../config';
import logger from '../logger';
import { HttpRequestError, classifyNetworkError, errorCode, errorMessage } from './errors';

// Probe targets routinely run self-signed or expired certificates.
const insecureAgent = new https.Agent({ rejectUnauthorized: false, keepAlive: false });

export interface HttpResponse {
  status: number;
  finalUrl: string;
  headers: Record<string, string>;
  body: Buffer;
}

export interface HttpGetOptions {
  timeoutMs?: number;
  maxRedirects?: number;
  userAgent?: string;
}

function headerValue(v: unknown): string | undefined {
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  if (Array.isArray(v)) return v.map(String).join(', ');
  return undefined;
}

/**
 * follow-redirects exposes the last URL on the underlying response as `responseUrl`.
 */
function responseUrlOf(request: unknown): string | undefined {
  if (typeof request !== 'object' || request === null || !('res' in request)) return undefined;
  const res: unknown = request.res;
  if (typeof res !== 'object' || res === null || !('responseUrl' in res)) return undefined;
  return typeof res.responseUrl === 'string' && res.responseUrl ? res.responseUrl : undefined;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  return Buffer.alloc(0);
}

/**
 * Single GET with redirects followed and certificate verification disabled.
 * Every status code counts as a response; only transport failures throw,
 * always as `HttpRequestError`.
 */
export async function httpGet(url: string, opts?: HttpGetOptions): Promise<HttpResponse> {
  const timeoutMs = opts?.timeoutMs ?? CONFIG.PROBE.TIMEOUT_MS;
  try {
    const res = await axios.get<ArrayBuffer>(url, {
      timeout: timeoutMs,
      maxRedirects: opts?.maxRedirects ?? CONFIG.PROBE.MAX_REDIRECTS,
      responseType: 'arraybuffer',
      validateStatus: () => true,
      httpsAgent: insecureAgent,
      headers: { 'User-Agent': opts?.userAgent ?? CONFIG.PROBE.USER_AGENT },
    });

    const headers: Record<string, string> = {};
    for (const [name, raw] of Object.entries(res.headers)) {
      const v = headerValue(raw);
      if (v !== undefined) headers[name.toLowerCase()] = v;
    }

    return {
      status: res.status,
      finalUrl: responseUrlOf(res.request) ?? url,
      headers,
      body: toBuffer(res.data),
    };
  } catch (err) {
    const kind = classifyNetworkError(err);
    logger.debug({ url, kind, code: errorCode(err) }, 'httpGet transport error');
    throw new HttpRequestError(kind, errorMessage(err), errorCode(err));
  }
}

export default httpGet;
