/**
 * Session Identity Management
 *
 * Assigns stable entity keys to sessions across polls. A key is derived from
 * (device, user) only; the server-assigned session id may churn without the
 * logical session changing and is never part of the key.
 */

import { ENTITY_KEY_PREFIX } from '@marquee/shared';

/**
 * Normalize parts into an identifier-safe token: lower-case, runs of
 * non-alphanumerics collapsed to "_", no leading or trailing "_".
 *
 * @example
 * slugify('emby', 'Living Room TV', 'John'); // "emby_living_room_tv_john"
 */
export function slugify(...parts: Array<string | undefined>): string {
  return parts
    .filter((p): p is string => p !== undefined && p.trim() !== '')
    .join('_')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Entity key for a (device, user) pair. Device-only when the user is absent.
 *
 * @example
 * sessionKey('Roku', 'john'); // "emby_roku_john"
 * sessionKey('Roku');         // "emby_roku"
 */
export function sessionKey(device: string, user?: string): string {
  return slugify(ENTITY_KEY_PREFIX, device, user);
}

/** Minimal shape the identity manager needs from a session */
export interface IdentifiableSession {
  sessionId: string;
  deviceName: string;
  deviceId?: string;
  userId?: string;
  userName?: string;
  userImageUrl?: string;
}

export interface ReconcileResult<T> {
  /** One session per key, merged where the poll reported duplicates */
  sessions: Array<T & { key: string }>;
  created: string[];
  retained: string[];
  removed: string[];
}

/**
 * Tracks which keys were live in the previous poll.
 * The key table is the only state kept between polls.
 */
export class SessionIdentityManager {
  /** key → server session id of the last observation */
  private readonly keys = new Map<string, string>();

  /**
   * Reconcile one poll's sessions against the key table and commit the result.
   */
  reconcile<T extends IdentifiableSession>(sessions: readonly T[]): ReconcileResult<T> {
    const result = this.plan(sessions);
    this.commit(result);
    return result;
  }

  /**
   * Work out keys for one poll without touching the key table.
   *
   * Duplicate (device, user) pairs within a poll collapse into the last
   * observed session; identity fields it lacks come from the earlier one.
   */
  plan<T extends IdentifiableSession>(sessions: readonly T[]): ReconcileResult<T> {
    const merged = new Map<string, T & { key: string }>();

    for (const session of sessions) {
      const key = sessionKey(session.deviceName, session.userName);
      const existing = merged.get(key);
      merged.set(key, existing ? mergeSessions(existing, session, key) : { ...session, key });
    }

    const created: string[] = [];
    const retained: string[] = [];
    for (const key of merged.keys()) {
      (this.keys.has(key) ? retained : created).push(key);
    }

    const removed = [...this.keys.keys()].filter((key) => !merged.has(key));

    return { sessions: [...merged.values()], created, retained, removed };
  }

  /**
   * Replace the key table with a planned poll's sessions
   */
  commit(result: ReconcileResult<IdentifiableSession>): void {
    this.keys.clear();
    for (const session of result.sessions) {
      this.keys.set(session.key, session.sessionId);
    }
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  /**
   * Server session id to address commands for a key
   */
  sessionIdFor(key: string): string | undefined {
    return this.keys.get(key);
  }

  get size(): number {
    return this.keys.size;
  }
}

function mergeSessions<T extends IdentifiableSession>(
  previous: T & { key: string },
  next: T,
  key: string
): T & { key: string } {
  const out: T & { key: string } = { ...next, key };
  // Identity carries over from the earlier duplicate; playback fields never do
  if (out.userId === undefined && previous.userId !== undefined) {
    out.userId = previous.userId;
  }
  if (out.userImageUrl === undefined && previous.userImageUrl !== undefined) {
    out.userImageUrl = previous.userImageUrl;
  }
  if (!out.deviceId && previous.deviceId) out.deviceId = previous.deviceId;
  return out;
}
