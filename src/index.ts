export { WebClient, createWebClient } from './core/WebClient';
export { CookieStore } from './core/CookieStore';
export { createLogger } from './core/Logger';
export {
  resolveClientOptions,
  ClientOptionsSchema,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TLS_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_DIAL_TIMEOUT_MS,
  DEFAULT_MAX_TRIES,
} from './config';
export { ConnectTimeoutError, formatHttpError } from './utils';

export type { ClientOptions, ClientOptionsInput } from './config';
export type {
  HttpMethod,
  HeaderValue,
  RequestHeaders,
  RequestBody,
  TransportOverrides,
} from './types/http.types';
export type { ConnectPhase } from './utils';
