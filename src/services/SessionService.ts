/**
 * Session Service
 * In-memory sessions holding the API token of one browser. Nothing is persisted.
 */
import { v4 as uuidv4 } from 'uuid';
import { createChildLogger, symbols } from '../core/Logger.js';
import type { FlashKind, FlashMessage } from '../types/index.js';

const logger = createChildLogger({ service: 'SessionService' });

export interface PanelSession {
  id: string;
  apiToken: string | null;
  flash: FlashMessage[];
  createdAt: number;
  lastActivityAt: number;
}

export interface SessionServiceOptions {
  idleTimeout: number;
  /** Once full, starting a session drops the one idle the longest */
  maxSessions?: number;
  now?: () => number;
}

export const DEFAULT_MAX_SESSIONS = 10_000;

export class SessionService {
  private readonly sessions = new Map<string, PanelSession>();
  private readonly idleTimeout: number;
  private readonly maxSessions: number;
  private readonly now: () => number;

  constructor(options: SessionServiceOptions) {
    this.idleTimeout = options.idleTimeout;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Create a new empty session, dropping expired ones first
   */
  create(): PanelSession {
    this.purgeExpired();
    if (this.sessions.size >= this.maxSessions) {
      this.evictIdlest();
    }

    const timestamp = this.now();
    const session: PanelSession = {
      id: uuidv4(),
      apiToken: null,
      flash: [],
      createdAt: timestamp,
      lastActivityAt: timestamp,
    };

    this.sessions.set(session.id, session);
    logger.debug({ sessionId: session.id }, 'Session created');
    return session;
  }

  /**
   * Look up a live session and mark it active
   */
  get(id: string): PanelSession | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }

    if (this.isExpired(session)) {
      this.sessions.delete(id);
      logger.debug({ sessionId: id }, 'Session expired');
      return undefined;
    }

    session.lastActivityAt = this.now();
    return session;
  }

  setToken(session: PanelSession, apiToken: string): void {
    session.apiToken = apiToken;
    logger.info({ sessionId: session.id }, `${symbols.session} API token set for session`);
  }

  clearToken(session: PanelSession): void {
    session.apiToken = null;
    logger.info({ sessionId: session.id }, 'API token cleared for session');
  }

  addFlash(session: PanelSession, kind: FlashKind, message: string): void {
    session.flash.push({ kind, message });
  }

  /**
   * Return pending flash messages and forget them
   */
  takeFlash(session: PanelSession): FlashMessage[] {
    const messages = session.flash;
    session.flash = [];
    return messages;
  }

  purgeExpired(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug({ count: removed }, 'Expired sessions removed');
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private evictIdlest(): void {
    let idlest: PanelSession | undefined;
    for (const session of this.sessions.values()) {
      if (!idlest || session.lastActivityAt < idlest.lastActivityAt) {
        idlest = session;
      }
    }

    if (idlest) {
      this.sessions.delete(idlest.id);
      logger.warn({ sessionId: idlest.id, count: this.sessions.size }, 'Session store full, dropped the idlest session');
    }
  }

  private isExpired(session: PanelSession): boolean {
    return this.now() - session.lastActivityAt > this.idleTimeout;
  }
}
