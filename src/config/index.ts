export { resolveClientOptions } from './ClientOptions';
export {
  ClientOptionsSchema,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TLS_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_DIAL_TIMEOUT_MS,
  DEFAULT_MAX_TRIES,
} from './schemas/options.schema';
export type { ClientOptions, ClientOptionsInput } from './schemas/options.schema';
