/**
 * Zod schemas for configuration validation
 */
import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const appConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  logLevel: logLevelSchema.default('info'),
  trustProxy: z.coerce.boolean().default(false),
});

export const providerConfigSchema = z.object({
  apiBaseUrl: z.string().url().default('https://api.cloudflare.com/client/v4'),
  requestTimeout: z.coerce.number().int().min(1000).max(120000).default(20000),
});

export const sessionConfigSchema = z.object({
  secret: z.string().min(32),
  idleTimeout: z.coerce.number().int().min(60000).default(30 * 60 * 1000),
  maxSessions: z.coerce.number().int().min(1).default(10000),
  cookieName: z.string().min(1).default('dns_panel_sid'),
  secureCookie: z.coerce.boolean().default(false),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type SessionConfig = z.infer<typeof sessionConfigSchema>;
