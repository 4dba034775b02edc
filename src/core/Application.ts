/**
 * Application Lifecycle Manager
 * Starts the HTTP server and shuts it down on signals
 */
import type { Server } from 'http';
import { logger, symbols } from './Logger.js';
import { getConfig, type ConfigOverrides } from '../config/ConfigManager.js';
import { createApp, type AppOptions } from '../app.js';

export interface ApplicationOptions extends Omit<AppOptions, 'config'> {
  overrides?: ConfigOverrides;
  handleSignals?: boolean;
}

export class Application {
  private server: Server | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(private readonly options: ApplicationOptions = {}) {}

  /**
   * Start listening; resolves once the port is bound
   */
  async start(): Promise<Server> {
    const config = getConfig(this.options.overrides);
    const { host, port } = config.app;
    const app = createApp({ ...this.options, config });

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(port, host, () => {
        resolve(listening);
      });
      listening.once('error', reject);
    });

    server.on('error', (error) => {
      logger.error({ error }, 'HTTP server error');
    });

    this.server = server;
    logger.info({ host, port }, `${symbols.startup} DNS panel listening on http://${host}:${port}`);

    if (this.options.handleSignals ?? true) {
      this.setupShutdownHandlers();
    }

    return server;
  }

  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Shutdown signal received');
      try {
        await this.shutdown(signal);
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.once('SIGTERM', () => void shutdown('SIGTERM'));
    process.once('SIGINT', () => void shutdown('SIGINT'));
  }

  /**
   * Stop accepting connections and wait for open requests to finish
   */
  shutdown(reason: string = 'manual'): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }

    logger.info({ reason }, 'Shutting down DNS panel');
    this.shutdownPromise = new Promise<void>((resolve, reject) => {
      server.close((error) => {
        this.server = null;
        this.shutdownPromise = null;
        if (error) {
          reject(error);
          return;
        }
        logger.info('DNS panel shutdown complete');
        resolve();
      });
    });

    return this.shutdownPromise;
  }
}

export function createApplication(options?: ApplicationOptions): Application {
  return new Application(options);
}
