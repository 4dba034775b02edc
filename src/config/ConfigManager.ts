/**
 * Configuration Manager
 * Centralized configuration loading and validation
 */
import { readFileSync, existsSync } from 'fs';
import { randomBytes } from 'crypto';
import { logger, setLogLevel } from '../core/Logger.js';
import {
  appConfigSchema,
  providerConfigSchema,
  sessionConfigSchema,
  type AppConfig,
  type ProviderConfig,
  type SessionConfig,
} from './schema.js';

/**
 * Values that take precedence over the environment (command line flags)
 */
export interface ConfigOverrides {
  host?: string;
  port?: number;
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Read secret from file (Docker secrets support) or environment
 */
function getSecret(key: string): string | undefined {
  const secretPath = `/run/secrets/${key.toLowerCase()}`;
  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf-8').trim();
    } catch (error) {
      logger.warn({ key, error }, 'Failed to read Docker secret');
    }
  }

  return process.env[key];
}

function generateSecret(length: number = 48): string {
  return randomBytes(Math.ceil(length * 0.75)).toString('base64url').slice(0, length);
}

export class ConfigManager {
  private readonly _app: AppConfig;
  private readonly _provider: ProviderConfig;
  private readonly _session: SessionConfig;

  constructor(overrides: ConfigOverrides = {}) {
    this._app = appConfigSchema.parse({
      host: overrides.host ?? getEnv('HOST', '0.0.0.0'),
      port: overrides.port ?? getEnvInt('PORT', 8000),
      logLevel: getEnv('LOG_LEVEL', 'info')?.toLowerCase(),
      trustProxy: getEnvBool('TRUST_PROXY', false),
    });

    setLogLevel(this._app.logLevel);

    this._provider = providerConfigSchema.parse({
      apiBaseUrl: getEnv('CF_API_BASE_URL', 'https://api.cloudflare.com/client/v4'),
      requestTimeout: getEnvInt('CF_REQUEST_TIMEOUT', 20000),
    });

    // Without SESSION_SECRET, session cookies do not survive a restart
    this._session = sessionConfigSchema.parse({
      secret: getSecret('SESSION_SECRET') ?? generateSecret(),
      idleTimeout: getEnvInt('SESSION_IDLE_TIMEOUT', 30 * 60 * 1000),
      maxSessions: getEnvInt('SESSION_MAX', 10000),
      cookieName: getEnv('SESSION_COOKIE_NAME', 'dns_panel_sid'),
      secureCookie: getEnvBool('SESSION_COOKIE_SECURE', false),
    });

    logger.debug({
      host: this._app.host,
      port: this._app.port,
      logLevel: this._app.logLevel,
      apiBaseUrl: this._provider.apiBaseUrl,
    }, 'Configuration loaded');
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get provider(): Readonly<ProviderConfig> {
    return this._provider;
  }

  get session(): Readonly<SessionConfig> {
    return this._session;
  }
}

let configInstance: ConfigManager | null = null;

/**
 * Get the configuration singleton; overrides only apply on first load
 */
export function getConfig(overrides?: ConfigOverrides): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager(overrides);
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
