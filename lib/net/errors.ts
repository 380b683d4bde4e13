export type NetworkErrorKind = 'tls' | 'timeout' | 'dns' | 'refused' | 'reset' | 'protocol' | 'other';

/**
 * Thrown by the HTTP client when no response could be obtained.
 * `kind` is the classified transport failure; `code` the raw Node/axios code, when any.
 */
export class HttpRequestError extends Error {
  readonly kind: NetworkErrorKind;
  readonly code?: string;

  constructor(kind: NetworkErrorKind, message: string, code?: string) {
    super(message);
    this.name = 'HttpRequestError';
    this.kind = kind;
    this.code = code;
  }
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT', 'ERR_CANCELED', 'ABORT_ERR']);
const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NODATA', 'ENODATA']);
const TLS_CODE = /^(ERR_SSL_|ERR_TLS_)|^EPROTO$|CERT|^SSL_/;
const TLS_MESSAGE = /\b(ssl|tls)\b|handshake|certificate/i;

function readCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

function readCause(err: unknown): unknown {
  if (typeof err !== 'object' || err === null || !('cause' in err)) return undefined;
  return err.cause;
}

/**
 * Extract the most specific error code from an error and its `cause` chain.
 */
export function errorCode(err: unknown): string | undefined {
  let current: unknown = err;
  let code: string | undefined;
  for (let depth = 0; depth < 4 && current !== undefined; depth++) {
    code = readCode(current) ?? code;
    current = readCause(current);
  }
  return code;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Map a transport error to a failure kind. Codes win over messages; a
 * handshake failure without a TLS code (ECONNRESET during the handshake)
 * is recognised by its message.
 */
export function classifyNetworkError(err: unknown): NetworkErrorKind {
  if (err instanceof HttpRequestError) return err.kind;

  const code = errorCode(err);
  const message = errorMessage(err);

  if (code && TLS_CODE.test(code)) return 'tls';
  if (code && TIMEOUT_CODES.has(code)) return 'timeout';
  if (code && DNS_CODES.has(code)) return 'dns';
  if (code === 'ECONNREFUSED') return 'refused';
  if (TLS_MESSAGE.test(message)) return 'tls';
  if (code === 'ECONNRESET' || code === 'EPIPE') return 'reset';
  if (!code && /timeout/i.test(message)) return 'timeout';
  if (code && (code.startsWith('HPE_') || code.startsWith('ERR_FR_') || code === 'ERR_BAD_RESPONSE')) return 'protocol';
  return 'other';
}
