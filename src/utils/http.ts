import axios, { AxiosHeaders } from 'axios';
import type { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { Readable } from 'stream';
import type { CookieStore } from '../core/CookieStore';
import type { RequestBody, RequestHeaders } from '../types/http.types';
import type { TimedAgents } from './agents';

export interface TransportConfig {
  timeout: number;
  agents: TimedAgents;
  cookies: CookieStore;
  adapter?: AxiosAdapter;
}

export const MAX_REDIRECTS = 10;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// Credentials are not forwarded to another host
const CROSS_HOST_HEADERS = ['Authorization', 'Www-Authenticate', 'Cookie', 'Cookie2'];

/**
 * One request of a redirect chain
 */
export interface HopRequest {
  method: string;
  url: string;
  headers: AxiosHeaders;
  data?: RequestBody;
}

/**
 * Create the axios instance every request of a client goes through.
 * Any HTTP status resolves; only transport failures reject. Redirects are
 * returned as responses so that each hop passes through the cookie interceptor.
 */
export function createTransport(config: TransportConfig): AxiosInstance {
  const client = axios.create({
    timeout: config.timeout,
    httpAgent: config.agents.http,
    httpsAgent: config.agents.https,
    maxRedirects: 0,
    validateStatus: () => true,
    adapter: config.adapter,
  });

  addCookieInterceptor(client, config.cookies);

  return client;
}

/**
 * Attach jar cookies to outgoing requests and store Set-Cookie headers of responses
 */
function addCookieInterceptor(client: AxiosInstance, cookies: CookieStore): void {
  client.interceptors.request.use(async (config) => {
    if (!config.headers.has('Cookie')) {
      const header = await cookies.getCookieHeader(client.getUri(config));
      if (header) {
        config.headers.set('Cookie', header);
      }
    }
    return config;
  });

  client.interceptors.response.use(async (response) => {
    const setCookie = response.headers['set-cookie'];
    const values: unknown[] = Array.isArray(setCookie) ? setCookie : [setCookie];
    const headers = values.filter((value): value is string => typeof value === 'string');

    if (headers.length > 0) {
      await cookies.storeSetCookies(client.getUri(response.config), headers);
    }
    return response;
  });
}

/**
 * The request that follows `status`, or undefined when the response is final.
 *
 * 301, 302 and 303 continue as a bodiless GET (HEAD stays HEAD); 307 and 308
 * repeat the method and body.
 */
export function nextRedirect(
  request: HopRequest,
  status: number,
  location: unknown
): HopRequest | undefined {
  if (!REDIRECT_STATUSES.has(status) || typeof location !== 'string' || location === '') {
    return undefined;
  }

  const target = new URL(location, request.url);
  const headers = new AxiosHeaders(request.headers);
  if (target.host !== new URL(request.url).host) {
    for (const name of CROSS_HOST_HEADERS) {
      headers.delete(name);
    }
  }

  if (status === 307 || status === 308) {
    return { ...request, url: target.toString(), headers };
  }

  headers.delete('Content-Type');
  headers.delete('Content-Length');
  return {
    method: request.method.toUpperCase() === 'HEAD' ? request.method : 'GET',
    url: target.toString(),
    headers,
  };
}

/**
 * Merge request headers, keeping every value of a repeated name
 */
export function buildRequestHeaders(headers: RequestHeaders = {}): AxiosHeaders {
  const entries: Array<readonly [string, string | readonly string[]]> = isHeaderList(headers)
    ? [...headers]
    : Object.entries(headers);

  const merged = new Map<string, { name: string; values: string[] }>();
  for (const [name, value] of entries) {
    const key = name.toLowerCase();
    const entry = merged.get(key) ?? { name, values: [] };
    entry.values.push(...(typeof value === 'string' ? [value] : value));
    merged.set(key, entry);
  }

  const result = new AxiosHeaders();
  for (const { name, values } of merged.values()) {
    result.set(name, values.length === 1 ? values[0] : values);
  }
  return result;
}

function isHeaderList(
  headers: RequestHeaders
): headers is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(headers);
}

/**
 * Read a response payload fully into memory
 */
export async function readBody(data: unknown): Promise<Buffer> {
  if (data instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of data) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof Uint8Array) {
    return Buffer.from(data);
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (typeof data === 'string') {
    return Buffer.from(data);
  }
  if (data === undefined || data === null) {
    return Buffer.alloc(0);
  }
  throw new Error(`Unsupported response body type: ${typeof data}`);
}

/**
 * Release the connection held by a response stream
 */
export function releaseBody(data: unknown): void {
  if (data instanceof Readable && !data.destroyed) {
    data.destroy();
  }
}

/**
 * Sleep utility for delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Format a transport error for logging
 */
export function formatHttpError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  const axiosError: AxiosError = error;
  const url = axiosError.config?.url || 'unknown';

  switch (axiosError.code) {
    case 'ECONNREFUSED':
      return `Connection refused to ${url}`;
    case 'ECONNABORTED':
    case 'ETIMEDOUT':
      return `Request timed out for ${url}`;
    case 'ENOTFOUND':
      return `Host not found for ${url}`;
    case 'EDIALTIMEOUT':
      return `Dial timed out for ${url}`;
    case 'ETLSHANDSHAKETIMEOUT':
      return `TLS handshake timed out for ${url}`;
    case 'ERR_CANCELED':
      return `Request canceled for ${url}`;
  }

  if (axiosError.request) {
    return `No response received from ${url}: ${axiosError.code || axiosError.message}`;
  }

  // Error setting up request
  return axiosError.message;
}
