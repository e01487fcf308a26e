import axios from 'axios';
import type { AxiosInstance, AxiosProxyConfig, CreateAxiosDefaults } from 'axios';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { createLogger } from '../logger/logger.js';
import { ValidationError, err, getErrorMessage, ok } from '../../utils/errors.js';
import type { Result } from '../../utils/errors.js';
import type { TransportError, TransportErrorKind, TransportResponse } from '../probe/types.js';

const logger = createLogger('http');

/** Statuses worth another attempt: rate limiting and transient upstream failures. */
export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const MAX_REDIRECTS = 10;
const MAX_RETRY_AFTER_MS = 30_000;

export type ProbeOutcome = Result<TransportResponse, TransportError>;

/**
 * A GET-only transport that never throws. Retries and redirects are its
 * business; callers see one final outcome.
 */
export interface HttpTransport {
  get(url: string): Promise<ProbeOutcome>;
}

export interface HttpClientOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  /** http(s):// or socks4(a)/socks5(h):// proxy URL. Without one, HTTP(S)_PROXY from the environment applies. */
  proxy?: string;
  maxRetries: number;
  /** Base delay; attempt n waits backoffMs * 2^(n-1). */
  backoffMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const SOCKS_PROTOCOLS: ReadonlySet<string> = new Set(['socks4', 'socks4a', 'socks5', 'socks5h']);

/** How requests reach the proxy: axios' own CONNECT support, or a SOCKS agent. */
export type ProxyRoute =
  | { kind: 'http'; config: AxiosProxyConfig }
  | { kind: 'socks'; agent: SocksProxyAgent };

export function parseProxy(proxy: string): ProxyRoute {
  let url: URL;
  try {
    url = new URL(proxy);
  } catch {
    throw new ValidationError(`Invalid proxy URL: ${proxy}`, { proxy });
  }

  const protocol = url.protocol.replace(/:$/, '');
  if (SOCKS_PROTOCOLS.has(protocol)) {
    return { kind: 'socks', agent: new SocksProxyAgent(url) };
  }
  if (protocol !== 'http' && protocol !== 'https') {
    throw new ValidationError(`Unsupported proxy protocol "${protocol}" (use http, https, socks4, socks4a, socks5 or socks5h)`, {
      proxy,
    });
  }

  const config: AxiosProxyConfig = {
    protocol,
    host: url.hostname,
    port: url.port ? Number(url.port) : protocol === 'https' ? 443 : 80,
  };
  if (url.username) {
    config.auth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password),
    };
  }
  return { kind: 'http', config };
}

/** Axios settings for the proxy flag; none leaves axios reading HTTP(S)_PROXY and NO_PROXY. */
function proxyDefaults(proxy: string | undefined): CreateAxiosDefaults {
  if (!proxy) return {};
  const route = parseProxy(proxy);
  switch (route.kind) {
    case 'http':
      return { proxy: route.config };
    case 'socks':
      return { proxy: false, httpAgent: route.agent, httpsAgent: route.agent };
  }
}

const TLS_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'EPROTO',
]);

export function classifyTransportError(error: unknown): TransportErrorKind {
  const code = axios.isAxiosError(error) ? error.code : undefined;
  switch (code) {
    case 'ECONNABORTED':
    case 'ETIMEDOUT':
    case 'ESOCKETTIMEDOUT':
      return 'Timeout';
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return 'DnsFailure';
    case 'ECONNREFUSED':
      return 'ConnectionRefused';
    case 'ECONNRESET':
    case 'EPIPE':
    case 'ERR_BAD_RESPONSE':
      return 'ConnectionReset';
    case 'ERR_FR_TOO_MANY_REDIRECTS':
      return 'TooManyRedirects';
    case 'ERR_INVALID_URL':
      return 'InvalidUrl';
  }
  if (code && (TLS_CODES.has(code) || code.startsWith('ERR_SSL') || code.startsWith('CERT_'))) {
    return 'TlsError';
  }
  return 'RequestError';
}

/** Retry-After in seconds, capped. Returns null when absent or an HTTP date. */
export function parseRetryAfter(value: unknown): number | null {
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) return null;
  return Math.min(Number(value.trim()) * 1000, MAX_RETRY_AFTER_MS);
}

export class HttpClient implements HttpTransport {
  private readonly http: AxiosInstance;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: HttpClientOptions) {
    this.http = axios.create({
      headers: options.headers,
      timeout: options.timeoutMs,
      maxRedirects: MAX_REDIRECTS,
      responseType: 'text',
      // Bodies are searched as raw text, never parsed
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      ...proxyDefaults(options.proxy),
    });
    this.maxRetries = options.maxRetries;
    this.backoffMs = options.backoffMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async get(url: string): Promise<ProbeOutcome> {
    for (let attempt = 1; ; attempt++) {
      let status: number;
      let body: string;
      let retryAfter: unknown;
      try {
        const res = await this.http.get<unknown>(url);
        status = res.status;
        body = typeof res.data === 'string' ? res.data : '';
        retryAfter = res.headers['retry-after'];
      } catch (error) {
        const kind = classifyTransportError(error);
        logger.debug({ url, kind, err: getErrorMessage(error) }, 'Request failed');
        return err({ kind, message: getErrorMessage(error) });
      }

      if (RETRY_STATUSES.has(status) && attempt <= this.maxRetries) {
        const delay = parseRetryAfter(retryAfter) ?? this.backoffMs * Math.pow(2, attempt - 1);
        logger.debug({ url, status, attempt, delay }, 'Retryable status, backing off');
        await this.sleep(delay);
        continue;
      }

      return ok({ status, body });
    }
  }
}
