import { parseSnapshot, SessionSnapshot } from "./snapshot";

/**
 * Durable registry of in-flight sessions. Writes replace the whole snapshot.
 */
export type SessionStore = {
  save(snapshot: SessionSnapshot): Promise<void>;
  /** Saves `next` and removes `previousId` together. */
  replace(previousId: string, next: SessionSnapshot): Promise<void>;
  get(sessionId: string): Promise<SessionSnapshot | null>;
  delete(sessionId: string): Promise<boolean>;
  list(): Promise<SessionSnapshot[]>;
  /** Most recent session (by createdAt) in a channel. */
  latestInChannel(guildId: string, channelId: string): Promise<SessionSnapshot | null>;
  /** Deletes records that no longer match the snapshot schema; returns how many. */
  purgeUnreadable(): Promise<number>;
};

export class InMemorySessionStore implements SessionStore {
  private readonly rows = new Map<string, string>();

  /** `seed` holds raw records, e.g. ones written by an older release. */
  constructor(seed: Iterable<[string, unknown]> = []) {
    for (const [id, raw] of seed) this.rows.set(id, JSON.stringify(raw));
  }

  async save(snapshot: SessionSnapshot): Promise<void> {
    this.rows.set(snapshot.sessionId, JSON.stringify(snapshot));
  }

  async replace(previousId: string, next: SessionSnapshot): Promise<void> {
    this.rows.set(next.sessionId, JSON.stringify(next));
    if (previousId !== next.sessionId) this.rows.delete(previousId);
  }

  async get(sessionId: string): Promise<SessionSnapshot | null> {
    const raw = this.rows.get(sessionId);
    return raw === undefined ? null : decode(raw);
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.rows.delete(sessionId);
  }

  async list(): Promise<SessionSnapshot[]> {
    return [...this.rows.values()].map(decode);
  }

  async latestInChannel(guildId: string, channelId: string): Promise<SessionSnapshot | null> {
    let latest: SessionSnapshot | null = null;
    for (const snap of await this.list()) {
      if (snap.location.guildId !== guildId || snap.location.channelId !== channelId) continue;
      if (!latest || snap.createdAt > latest.createdAt) latest = snap;
    }
    return latest;
  }

  async purgeUnreadable(): Promise<number> {
    let purged = 0;
    for (const [id, raw] of this.rows) {
      if (parseSnapshot(JSON.parse(raw))) continue;
      this.rows.delete(id);
      purged++;
    }
    return purged;
  }
}

function decode(raw: string): SessionSnapshot {
  const snap = parseSnapshot(JSON.parse(raw));
  if (!snap) throw new Error("Stored snapshot does not match the snapshot schema.");
  return snap;
}
