/**
 * Health Check Controller
 */
import type { Request, Response } from 'express';
import type { SessionService } from '../../services/SessionService.js';

export const APP_VERSION = '1.0.0';

export interface HealthStatus {
  status: 'ok';
  version: string;
  uptime: number;
  timestamp: string;
  sessions: number;
}

/**
 * Liveness only: the provider is not contacted since the panel holds no token of its own
 */
export function createHealthCheck(sessions: SessionService) {
  return (_req: Request, res: Response): void => {
    const health: HealthStatus = {
      status: 'ok',
      version: APP_VERSION,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      sessions: sessions.size,
    };
    res.json(health);
  };
}
