import { ClientOptionsSchema } from './schemas/options.schema';
import type { ClientOptions, ClientOptionsInput } from './schemas/options.schema';

/**
 * Validate client options and fill in the defaults.
 * @throws Error listing every invalid field
 */
export function resolveClientOptions(input: ClientOptionsInput = {}): Readonly<ClientOptions> {
  const result = ClientOptionsSchema.safeParse(input);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('\n');
    throw new Error(`Client options validation failed:\n${errors}`);
  }

  const { retryDelay, ...rest } = result.data;

  return Object.freeze({
    ...rest,
    retryDelay: retryDelay ?? rest.timeout,
  });
}
