import type { AxiosInstance, AxiosResponse } from 'axios';
import type { Cookie } from 'tough-cookie';
import { createLogger } from './Logger';
import { CookieStore } from './CookieStore';
import { resolveClientOptions } from '../config';
import type { ClientOptions, ClientOptionsInput } from '../config';
import { createTimedAgents } from '../utils/agents';
import type { TimedAgents } from '../utils/agents';
import {
  MAX_REDIRECTS,
  buildRequestHeaders,
  createTransport,
  formatHttpError,
  nextRedirect,
  readBody,
  releaseBody,
  sleep,
} from '../utils/http';
import type { HopRequest } from '../utils/http';
import type {
  HttpMethod,
  RequestBody,
  RequestHeaders,
  TransportOverrides,
} from '../types/http.types';

const logger = createLogger('WebClient');

/**
 * WebClient is a preconfigured HTTP client: one cookie jar shared by all of its
 * requests, dial/TLS/request timeouts, retries on transport failure and
 * optional verbose request logging.
 *
 * Any HTTP status counts as a response. Only failures to get one (refused
 * connections, DNS errors, timeouts) are retried, up to `maxTries` times with
 * `retryDelay` ms between attempts.
 */
export class WebClient {
  readonly options: Readonly<ClientOptions>;
  private readonly cookies: CookieStore;
  private readonly agents: TimedAgents;
  private readonly http: AxiosInstance;

  constructor(options?: ClientOptionsInput, overrides: TransportOverrides = {}) {
    this.options = resolveClientOptions(options);
    this.cookies = new CookieStore();
    this.agents = createTimedAgents(this.options);
    this.http = createTransport({
      timeout: this.options.timeout,
      agents: this.agents,
      cookies: this.cookies,
      adapter: overrides.adapter,
    });
  }

  get(url: string, headers?: RequestHeaders): Promise<Buffer> {
    return this.fetch('GET', url, headers);
  }

  post(url: string, headers?: RequestHeaders, body?: RequestBody): Promise<Buffer> {
    return this.fetch('POST', url, headers, body);
  }

  customRequest(
    method: HttpMethod,
    url: string,
    headers?: RequestHeaders,
    body?: RequestBody
  ): Promise<Buffer> {
    return this.fetch(method, url, headers, body);
  }

  /**
   * Send a request and read the whole response body.
   *
   * Redirects are followed, up to 10 per attempt, with the cookie jar applied
   * on every hop. A body stream is consumed by the first attempt, so stream
   * uploads should either be re-readable or go through a client with `maxTries: 0`.
   *
   * @throws TypeError when `url` is not an absolute URL
   * @throws the last transport error once the retry budget is spent
   */
  async fetch(
    method: HttpMethod,
    url: string,
    headers?: RequestHeaders,
    body?: RequestBody
  ): Promise<Buffer> {
    // Reject malformed URLs before the retry loop
    new URL(url);
    const requestHeaders = buildRequestHeaders(headers);
    const { maxTries, retryDelay } = this.options;

    this.log(`${method} ${url}`);

    for (let attempt = 0; ; attempt++) {
      let response: AxiosResponse<unknown>;
      try {
        response = await this.dispatch({ method, url, headers: requestHeaders, data: body });
      } catch (error) {
        if (attempt >= maxTries) {
          this.log(`Aborting ${method} ${url} after ${attempt + 1} attempt(s)`);
          throw error;
        }

        this.log(
          `Retrying ${method} ${url} in ${retryDelay}ms (retry ${attempt + 1}/${maxTries}): ${formatHttpError(error)}`
        );
        await sleep(retryDelay);
        continue;
      }

      try {
        this.log(`${method} ${url} - ${response.status}`);
        return await readBody(response.data);
      } finally {
        releaseBody(response.data);
      }
    }
  }

  /**
   * Send one attempt, following redirects. The deadline spans the whole chain.
   */
  private async dispatch(request: HopRequest): Promise<AxiosResponse<unknown>> {
    const signal = this.deadline();
    let hop = request;

    for (let redirects = 0; ; redirects++) {
      const response: AxiosResponse<unknown> = await this.http.request({
        method: hop.method,
        url: hop.url,
        headers: hop.headers,
        data: hop.data,
        responseType: 'stream',
        signal,
      });

      const next = nextRedirect(hop, response.status, response.headers['location']);
      if (!next) {
        return response;
      }

      releaseBody(response.data);
      if (redirects >= MAX_REDIRECTS) {
        throw new Error(`Stopped after ${MAX_REDIRECTS} redirects from ${request.url}`);
      }

      this.log(`${hop.method} ${hop.url} - ${response.status}, following to ${next.url}`);
      hop = next;
    }
  }

  /**
   * Write the cookies the jar holds for `siteURL` to `filePath` as JSON
   */
  async exportCookies(filePath: string, siteURL: string): Promise<void> {
    await this.cookies.exportToFile(filePath, siteURL);
  }

  /**
   * Install the cookies stored in `filePath` for `siteURL`. On failure the jar is unchanged.
   */
  async importCookies(filePath: string, siteURL: string): Promise<void> {
    await this.cookies.importFromFile(filePath, siteURL);
  }

  getCookies(siteURL: string): Promise<Cookie[]> {
    return this.cookies.getCookies(siteURL);
  }

  setCookie(cookie: string | Cookie, siteURL: string): Promise<void> {
    return this.cookies.setCookie(cookie, siteURL);
  }

  /**
   * Close idle keep-alive connections
   */
  close(): void {
    this.agents.http.destroy();
    this.agents.https.destroy();
  }

  private deadline(): AbortSignal | undefined {
    return this.options.timeout > 0 ? AbortSignal.timeout(this.options.timeout) : undefined;
  }

  private log(message: string): void {
    if (this.options.verbose) {
      logger.info(message);
    } else {
      logger.debug(message);
    }
  }
}

/**
 * Create a WebClient. Omitted options take their defaults.
 */
export function createWebClient(
  options?: ClientOptionsInput,
  overrides?: TransportOverrides
): WebClient {
  return new WebClient(options, overrides);
}
