/**
 * INPUT: session id (opaque random token)
 * OUTPUT: create / get / end session operations
 * POS: core module, in-memory session store; sessions never survive a restart
 */

import { randomBytes } from 'crypto';
import { getConfig } from '../config/appConfig';
import { AssistantSession } from './assistantSession';

/** Sweep interval for idle sessions (5 minutes) */
const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

const sessions = new Map<string, AssistantSession>();

function isExpired(session: AssistantSession, now: number): boolean {
  return now - session.updatedAt > getConfig().sessionTtlMs;
}

/** Creates an empty session with the configured cost controls */
export function createSession(): AssistantSession {
  const { maxCacheSize, rateLimitDelayMs } = getConfig();
  const sessionId = randomBytes(24).toString('hex');
  const session = new AssistantSession(sessionId, { maxCacheSize, rateLimitDelayMs });
  sessions.set(sessionId, session);
  return session;
}

function lookup(sessionId: string): AssistantSession | null {
  const session = sessions.get(sessionId);
  if (!session) return null;

  if (isExpired(session, Date.now())) {
    session.end();
    sessions.delete(sessionId);
    return null;
  }
  return session;
}

/** Returns the live session and marks it active, or null when unknown or idle past the TTL */
export function getSession(sessionId: string): AssistantSession | null {
  const session = lookup(sessionId);
  session?.touch();
  return session;
}

/** Like getSession, without refreshing the idle timer (read-only diagnostics) */
export function peekSession(sessionId: string): AssistantSession | null {
  return lookup(sessionId);
}

/** Ends a session and clears its cache and history; false when unknown */
export function endSession(sessionId: string): boolean {
  const session = sessions.get(sessionId);
  if (!session) return false;
  session.end();
  sessions.delete(sessionId);
  return true;
}

export function activeSessionCount(): number {
  return sessions.size;
}

/** Ends sessions idle past the TTL (called periodically) */
export function cleanExpiredSessions(): number {
  const now = Date.now();
  let removed = 0;
  for (const [sessionId, session] of sessions) {
    if (isExpired(session, now)) {
      session.end();
      sessions.delete(sessionId);
      removed++;
    }
  }
  if (removed > 0) {
    console.log(`[sessionStore] swept ${removed} idle session(s), ${sessions.size} active`);
  }
  return removed;
}

// unref: the sweep must not keep the process alive on its own
setInterval(cleanExpiredSessions, SWEEP_INTERVAL_MS).unref();
