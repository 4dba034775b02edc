/**
 * Session middleware
 * Binds each browser to an in-memory session through a signed cookie.
 * A session only starts once a handler needs to store something in it.
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { PanelSession, SessionService } from '../../services/SessionService.js';
import { ApiError } from './errorHandler.js';

declare global {
  namespace Express {
    interface Request {
      panelSession?: PanelSession;
      startPanelSession?: () => PanelSession;
    }
  }
}

export interface SessionMiddlewareOptions {
  cookieName: string;
  secure: boolean;
}

export function sessionMiddleware(sessions: SessionService, options: SessionMiddlewareOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const cookie: unknown = req.signedCookies?.[options.cookieName];
    req.panelSession = typeof cookie === 'string' ? sessions.get(cookie) : undefined;

    req.startPanelSession = () => {
      if (req.panelSession) {
        return req.panelSession;
      }

      const session = sessions.create();
      res.cookie(options.cookieName, session.id, {
        httpOnly: true,
        sameSite: 'strict',
        secure: options.secure,
        signed: true,
        path: '/',
      });
      req.panelSession = session;
      return session;
    };

    next();
  };
}

/**
 * Session of this browser, started (and its cookie set) on first use
 */
export function requireSession(req: Request): PanelSession {
  if (!req.startPanelSession) {
    throw ApiError.internal('Session middleware is not installed');
  }
  return req.startPanelSession();
}

/**
 * Session of this browser if it already has one
 */
export function findSession(req: Request): PanelSession | undefined {
  return req.panelSession;
}
