export { CloudflareProvider, CLOUDFLARE_API_BASE_URL, type CloudflareProviderOptions } from './CloudflareProvider.js';
