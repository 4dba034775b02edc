/**
 * DNS Provider Factory
 * Creates a provider bound to the token of the current session
 */
import type { DNSProvider } from './base/DNSProvider.js';
import { CloudflareProvider } from './cloudflare/index.js';
import type { ProviderConfig } from '../config/schema.js';

export type ProviderFactory = (apiToken: string) => DNSProvider;

export function createCloudflareProviderFactory(config: Readonly<ProviderConfig>): ProviderFactory {
  return (apiToken) =>
    new CloudflareProvider(apiToken, {
      baseURL: config.apiBaseUrl,
      timeout: config.requestTimeout,
    });
}
