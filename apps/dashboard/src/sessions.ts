import { randomUUID } from 'node:crypto';
import { createCareerSessionState, type CareerSessionState } from '@townsquare/career-ideas';
import { createMapSessionState, type MapSessionState } from '@townsquare/community-map';

export interface DashboardSession {
  readonly id: string;
  map: MapSessionState;
  careers: CareerSessionState;
  lastSeenAt: number;
}

export interface SessionRegistryOptions {
  idleMs: number;
  now?: () => number;
  createId?: () => string;
}

export interface ResolvedSession {
  session: DashboardSession;
  created: boolean;
}

/**
 * In-memory sessions keyed by an opaque id. Idle sessions are dropped on the next
 * lookup; nothing survives a restart.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, DashboardSession>();
  private readonly idleMs: number;
  private readonly now: () => number;
  private readonly createId: () => string;

  constructor(options: SessionRegistryOptions) {
    this.idleMs = options.idleMs;
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  resolve(id: string | undefined): ResolvedSession {
    const now = this.now();
    this.sweep(now);

    const existing = id ? this.sessions.get(id) : undefined;
    if (existing) {
      existing.lastSeenAt = now;
      return { session: existing, created: false };
    }

    const session: DashboardSession = {
      id: this.createId(),
      map: createMapSessionState(),
      careers: createCareerSessionState(),
      lastSeenAt: now,
    };
    this.sessions.set(session.id, session);
    return { session, created: true };
  }

  private sweep(now: number): void {
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt > this.idleMs) {
        this.sessions.delete(id);
      }
    }
  }
}
