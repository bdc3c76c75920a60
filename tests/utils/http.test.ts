import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { Readable } from 'stream';
import {
  buildRequestHeaders,
  createTransport,
  formatHttpError,
  nextRedirect,
  readBody,
  releaseBody,
  sleep,
} from '../../src/utils/http';
import { createTimedAgents } from '../../src/utils/agents';
import { CookieStore } from '../../src/core/CookieStore';

// Mock the logger
vi.mock('../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

function transportError(code: string, withRequest = true): AxiosError {
  return new AxiosError(
    `failed with ${code}`,
    code,
    { url: '/api/test', headers: new AxiosHeaders() },
    withRequest ? {} : undefined
  );
}

describe('HTTP Utilities', () => {
  describe('createTransport', () => {
    const agents = createTimedAgents({ dialTimeout: 1000, tlsHandshakeTimeout: 1000 });

    afterAll(() => {
      agents.http.destroy();
      agents.https.destroy();
    });

    it('should set the request timeout', () => {
      const client = createTransport({ timeout: 5000, agents, cookies: new CookieStore() });
      expect(client.defaults.timeout).toBe(5000);
    });

    it('should route requests through the timed agents', () => {
      const client = createTransport({ timeout: 5000, agents, cookies: new CookieStore() });
      expect(client.defaults.httpAgent).toBe(agents.http);
      expect(client.defaults.httpsAgent).toBe(agents.https);
    });

    it('should accept every HTTP status', () => {
      const client = createTransport({ timeout: 5000, agents, cookies: new CookieStore() });
      expect(client.defaults.validateStatus?.(404)).toBe(true);
      expect(client.defaults.validateStatus?.(503)).toBe(true);
    });

    it('should leave redirects to the caller', () => {
      const client = createTransport({ timeout: 5000, agents, cookies: new CookieStore() });
      expect(client.defaults.maxRedirects).toBe(0);
    });
  });

  describe('nextRedirect', () => {
    const request = {
      method: 'POST',
      url: 'https://shop.example.com/cart/checkout',
      headers: new AxiosHeaders({ 'Content-Type': 'text/plain', Cookie: 'sid=override' }),
      data: 'qty=1',
    };

    it('should ignore final statuses', () => {
      expect(nextRedirect(request, 200, '/elsewhere')).toBeUndefined();
      expect(nextRedirect(request, 304, '/elsewhere')).toBeUndefined();
    });

    it('should ignore redirects without a location', () => {
      expect(nextRedirect(request, 302, undefined)).toBeUndefined();
      expect(nextRedirect(request, 302, '')).toBeUndefined();
    });

    it('should resolve relative locations against the current URL', () => {
      expect(nextRedirect(request, 302, 'done')?.url).toBe('https://shop.example.com/cart/done');
    });

    it('should turn a 302 into a GET without a payload', () => {
      const next = nextRedirect(request, 302, '/done');
      expect(next?.method).toBe('GET');
      expect(next?.data).toBeUndefined();
      expect(next?.headers.has('Content-Type')).toBe(false);
      expect(next?.headers.get('Cookie')).toBe('sid=override');
    });

    it('should keep HEAD requests as HEAD', () => {
      expect(nextRedirect({ ...request, method: 'HEAD' }, 301, '/done')?.method).toBe('HEAD');
    });

    it('should keep the method and payload of a 308', () => {
      const next = nextRedirect(request, 308, '/v2/checkout');
      expect(next?.method).toBe('POST');
      expect(next?.data).toBe('qty=1');
      expect(next?.headers.get('Content-Type')).toBe('text/plain');
    });

    it('should strip the Cookie header on another host', () => {
      const next = nextRedirect(request, 307, 'https://pay.example.org/');
      expect(next?.headers.has('Cookie')).toBe(false);
    });

    it('should not modify the original headers', () => {
      nextRedirect(request, 303, 'https://pay.example.org/');
      expect(request.headers.get('Content-Type')).toBe('text/plain');
      expect(request.headers.get('Cookie')).toBe('sid=override');
    });
  });

  describe('buildRequestHeaders', () => {
    it('should return empty headers by default', () => {
      expect(buildRequestHeaders().toJSON()).toEqual({});
    });

    it('should keep single values as strings', () => {
      const headers = buildRequestHeaders({ Accept: 'text/html' });
      expect(headers.get('accept')).toBe('text/html');
    });

    it('should merge repeated names case-insensitively under the first spelling', () => {
      const headers = buildRequestHeaders([
        ['X-Tag', 'a'],
        ['x-tag', 'b'],
      ]);
      expect(headers.toJSON()).toEqual({ 'X-Tag': ['a', 'b'] });
    });

    it('should append array values', () => {
      const headers = buildRequestHeaders({ 'X-Tag': ['a', 'b'], Accept: 'text/html' });
      expect(headers.get('X-Tag')).toEqual(['a', 'b']);
      expect(headers.get('Accept')).toBe('text/html');
    });
  });

  describe('readBody', () => {
    it('should drain a stream', async () => {
      await expect(readBody(Readable.from(['he', 'llo']))).resolves.toEqual(Buffer.from('hello'));
    });

    it('should pass buffers through', async () => {
      const data = Buffer.from('raw');
      await expect(readBody(data)).resolves.toBe(data);
    });

    it('should copy byte arrays', async () => {
      await expect(readBody(new Uint8Array([104, 105]))).resolves.toEqual(Buffer.from('hi'));
    });

    it('should encode strings', async () => {
      await expect(readBody('text')).resolves.toEqual(Buffer.from('text'));
    });

    it('should treat a missing body as empty', async () => {
      await expect(readBody(undefined)).resolves.toHaveLength(0);
    });

    it('should reject unsupported payloads', async () => {
      await expect(readBody(42)).rejects.toThrow('Unsupported response body type: number');
    });

    it('should propagate stream errors', async () => {
      const broken = new Readable({
        read() {
          this.destroy(new Error('socket hang up'));
        },
      });
      await expect(readBody(broken)).rejects.toThrow('socket hang up');
    });
  });

  describe('releaseBody', () => {
    it('should destroy an open stream', () => {
      const stream = Readable.from(['pending']);
      releaseBody(stream);
      expect(stream.destroyed).toBe(true);
    });

    it('should ignore values that are not streams', () => {
      expect(() => releaseBody(Buffer.from('done'))).not.toThrow();
    });
  });

  describe('formatHttpError', () => {
    it('should format non-axios error', () => {
      expect(formatHttpError(new Error('Generic error'))).toBe('Generic error');
    });

    it('should format unknown error type', () => {
      expect(formatHttpError('string error')).toBe('Unknown error');
    });

    it('should format refused connections', () => {
      expect(formatHttpError(transportError('ECONNREFUSED'))).toBe('Connection refused to /api/test');
    });

    it('should format timeouts', () => {
      expect(formatHttpError(transportError('ETIMEDOUT'))).toBe('Request timed out for /api/test');
      expect(formatHttpError(transportError('ECONNABORTED'))).toBe('Request timed out for /api/test');
    });

    it('should format DNS failures', () => {
      expect(formatHttpError(transportError('ENOTFOUND'))).toBe('Host not found for /api/test');
    });

    it('should format connect phase timeouts', () => {
      expect(formatHttpError(transportError('EDIALTIMEOUT'))).toBe('Dial timed out for /api/test');
      expect(formatHttpError(transportError('ETLSHANDSHAKETIMEOUT'))).toBe(
        'TLS handshake timed out for /api/test'
      );
    });

    it('should format other errors without a response', () => {
      expect(formatHttpError(transportError('ECONNRESET'))).toBe(
        'No response received from /api/test: ECONNRESET'
      );
    });

    it('should fall back to the message for setup errors', () => {
      expect(formatHttpError(transportError('ERR_BAD_OPTION', false))).toBe(
        'failed with ERR_BAD_OPTION'
      );
    });
  });

  describe('sleep', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should resolve after the delay', async () => {
      const settled = vi.fn();
      const pending = sleep(1000).then(settled);

      await vi.advanceTimersByTimeAsync(999);
      expect(settled).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(settled).toHaveBeenCalledTimes(1);
    });
  });
});
