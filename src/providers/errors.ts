/**
 * Provider error normalisation
 * Every failure coming back from a DNS provider is turned into a ProviderError
 */
import Cloudflare from 'cloudflare';
import { z, ZodError } from 'zod';

export type ProviderErrorKind = 'authentication' | 'api' | 'network';

export interface ProviderErrorDetail {
  code?: number;
  message: string;
}

export const NETWORK_ERROR_MESSAGE =
  'Could not reach the DNS provider. Check your network connection and try again.';

/**
 * Cloudflare codes for invalid, expired or unauthorised tokens
 */
const AUTH_ERROR_CODES = new Set([9106, 9109, 10000, 10001]);

const errorBodySchema = z.object({
  errors: z
    .array(
      z.object({
        code: z.number().optional(),
        message: z.string(),
      })
    )
    .default([]),
  message: z.string().optional(),
});

export class ProviderError extends Error {
  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly status?: number,
    public readonly errors: ProviderErrorDetail[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }

  /**
   * Status code for the page that reports this error
   */
  get httpStatus(): number {
    switch (this.kind) {
      case 'authentication':
        return 401;
      case 'network':
        return 503;
      case 'api':
        return 502;
    }
  }

  static authentication(message: string, status?: number, errors: ProviderErrorDetail[] = []): ProviderError {
    return new ProviderError('authentication', `Authentication failed: ${message}`, status, errors);
  }

  static network(cause?: unknown): ProviderError {
    return new ProviderError('network', NETWORK_ERROR_MESSAGE, undefined, [], { cause });
  }
}

/**
 * Join provider error entries the way they are shown to the operator
 */
export function formatProviderErrors(errors: ProviderErrorDetail[]): string {
  return errors
    .map((e) => (e.code !== undefined ? `[${e.code}] ${e.message}` : e.message))
    .join('; ');
}

export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  // Connection errors are APIErrors without a status, check them first
  if (error instanceof Cloudflare.APIConnectionError) {
    return ProviderError.network(error);
  }

  if (error instanceof Cloudflare.APIError) {
    const body = errorBodySchema.safeParse(error.error);
    const details = body.success ? body.data.errors : [];
    const message = details.length > 0
      ? formatProviderErrors(details)
      : (body.success ? body.data.message : undefined) ?? error.message;

    const isAuthFailure =
      error.status === 401 ||
      error.status === 403 ||
      details.some((d) => d.code !== undefined && AUTH_ERROR_CODES.has(d.code));

    if (isAuthFailure) {
      return ProviderError.authentication(message, error.status, details);
    }
    return new ProviderError('api', message, error.status, details, { cause: error });
  }

  if (error instanceof ZodError) {
    return new ProviderError('api', 'Unexpected response from the DNS provider', undefined, [], { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError('api', message, undefined, [], { cause: error });
}
