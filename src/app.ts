/**
 * Express Application Setup
 */
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import { logger } from './core/Logger.js';
import { getConfig, type ConfigManager } from './config/ConfigManager.js';
import {
  createHealthCheck,
  createPanelRouter,
  errorHandler,
  notFoundHandler,
  sessionMiddleware,
} from './api/index.js';
import { createCloudflareProviderFactory, type ProviderFactory } from './providers/index.js';
import { PanelService } from './services/PanelService.js';
import { SessionService } from './services/SessionService.js';

export interface AppOptions {
  config?: ConfigManager;
  /** Defaults to Cloudflare at the configured base URL */
  providerFactory?: ProviderFactory;
  sessions?: SessionService;
}

/**
 * Create and configure the Express application
 */
export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const config = options.config ?? getConfig();
  const providerFactory = options.providerFactory ?? createCloudflareProviderFactory(config.provider);
  const sessions = options.sessions ?? new SessionService({
    idleTimeout: config.session.idleTimeout,
    maxSessions: config.session.maxSessions,
  });
  const panel = new PanelService(providerFactory);

  if (config.app.trustProxy) {
    app.set('trust proxy', true);
  }

  // Server-rendered pages with no scripts at all
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'none'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:'],
        formAction: ["'self'"],
        frameAncestors: ["'none'"],
        objectSrc: ["'none'"],
        upgradeInsecureRequests: config.session.secureCookie ? [] : null,
      },
    },
  }));

  app.use(cookieParser(config.session.secret));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug({
      method: req.method,
      url: req.url,
      ip: req.ip,
    }, 'Request received');
    next();
  });

  app.get('/health', createHealthCheck(sessions));

  app.use(sessionMiddleware(sessions, {
    cookieName: config.session.cookieName,
    secure: config.session.secureCookie,
  }));

  app.use('/', createPanelRouter({ panel, sessions }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
