import { z } from 'zod';

const durationMs = z.number().int().nonnegative();

export const DEFAULT_TIMEOUT_MS = 60000;
export const DEFAULT_TLS_HANDSHAKE_TIMEOUT_MS = 5000;
export const DEFAULT_DIAL_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_TRIES = 1;

// =============================================================================
// Client Options Schema
// =============================================================================

export const ClientOptionsSchema = z
  .object({
    timeout: durationMs.default(DEFAULT_TIMEOUT_MS),
    tlsHandshakeTimeout: durationMs.default(DEFAULT_TLS_HANDSHAKE_TIMEOUT_MS),
    dialTimeout: durationMs.default(DEFAULT_DIAL_TIMEOUT_MS),
    maxTries: z.number().int().nonnegative().default(DEFAULT_MAX_TRIES),
    // Falls back to `timeout` when absent
    retryDelay: durationMs.optional(),
    verbose: z.boolean().default(false),
  })
  .strict();

export type ClientOptionsInput = z.input<typeof ClientOptionsSchema>;

export interface ClientOptions {
  /** Absolute deadline of one attempt, body included. 0 disables it. */
  timeout: number;
  tlsHandshakeTimeout: number;
  dialTimeout: number;
  /** Retries after the first failed attempt */
  maxTries: number;
  retryDelay: number;
  verbose: boolean;
}
