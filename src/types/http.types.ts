import type { Readable } from 'stream';
import type { AxiosAdapter } from 'axios';

/**
 * HTTP verb accepted by the client. Any method string is passed through.
 */
export type HttpMethod =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'HEAD'
  | 'OPTIONS'
  | (string & {});

export type HeaderValue = string | readonly string[];

/**
 * Request headers. Every value is appended, so a name given more than once
 * (in any casing) is sent once per value.
 */
export type RequestHeaders =
  | Readonly<Record<string, HeaderValue>>
  | ReadonlyArray<readonly [string, string]>;

/**
 * Request payload. Streams are consumed by the first attempt; a retry
 * resends whatever is left of them.
 */
export type RequestBody = string | Buffer | Uint8Array | URLSearchParams | Readable;

/**
 * Transport substitutions applied when the client is built
 */
export interface TransportOverrides {
  adapter?: AxiosAdapter;
}
