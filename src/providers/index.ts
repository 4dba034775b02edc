/**
 * Provider exports
 */
export { DNSProvider } from './base/DNSProvider.js';
export { CloudflareProvider, CLOUDFLARE_API_BASE_URL, type CloudflareProviderOptions } from './cloudflare/index.js';
export { createCloudflareProviderFactory, type ProviderFactory } from './ProviderFactory.js';
export {
  ProviderError,
  toProviderError,
  formatProviderErrors,
  NETWORK_ERROR_MESSAGE,
  type ProviderErrorKind,
  type ProviderErrorDetail,
} from './errors.js';
