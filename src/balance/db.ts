import { Pool, PoolClient } from "pg";
import { withTx } from "../db";
import { Logger } from "../logger";
import { parseSnapshot, SessionSnapshot } from "./snapshot";
import { SessionStore } from "./store";

export type SessionRow = {
  id: string;
  snapshot: unknown; // jsonb, validated on read
};

export class PgSessionStore implements SessionStore {
  constructor(
    private readonly pool: Pool,
    private readonly logger: Logger
  ) {}

  async save(snapshot: SessionSnapshot): Promise<void> {
    await withTx(this.pool, (c) => upsertSession(c, snapshot));
  }

  async replace(previousId: string, next: SessionSnapshot): Promise<void> {
    await withTx(this.pool, async (c) => {
      await upsertSession(c, next);
      if (previousId !== next.sessionId) await deleteSession(c, previousId);
    });
  }

  async get(sessionId: string): Promise<SessionSnapshot | null> {
    const res = await this.pool.query<SessionRow>(
      `SELECT id, snapshot FROM balance_sessions WHERE id = $1`,
      [sessionId]
    );
    const row = res.rows[0];
    return row ? this.decode(row) : null;
  }

  async delete(sessionId: string): Promise<boolean> {
    return (await withTx(this.pool, (c) => deleteSession(c, sessionId))) > 0;
  }

  async list(): Promise<SessionSnapshot[]> {
    const res = await this.pool.query<SessionRow>(
      `SELECT id, snapshot FROM balance_sessions ORDER BY created_at ASC, id ASC`
    );
    return decodeRows(res.rows, this.logger);
  }

  async latestInChannel(guildId: string, channelId: string): Promise<SessionSnapshot | null> {
    const res = await this.pool.query<SessionRow>(
      `SELECT id, snapshot
       FROM balance_sessions
       WHERE guild_id = $1 AND channel_id = $2
       ORDER BY created_at DESC, id DESC`,
      [guildId, channelId]
    );
    // Skip corrupt rows instead of hiding older valid ones.
    return decodeRows(res.rows, this.logger)[0] ?? null;
  }

  async purgeUnreadable(): Promise<number> {
    const res = await this.pool.query<SessionRow>(`SELECT id, snapshot FROM balance_sessions`);
    const unreadable = res.rows.filter((r) => !parseSnapshot(r.snapshot)).map((r) => r.id);
    if (unreadable.length === 0) return 0;

    const deleted = await this.pool.query(`DELETE FROM balance_sessions WHERE id = ANY($1)`, [
      unreadable,
    ]);
    return deleted.rowCount ?? 0;
  }

  private decode(row: SessionRow): SessionSnapshot | null {
    return decodeRows([row], this.logger)[0] ?? null;
  }
}

export function decodeRows(rows: SessionRow[], logger: Logger): SessionSnapshot[] {
  const out: SessionSnapshot[] = [];
  for (const row of rows) {
    const snap = parseSnapshot(row.snapshot);
    if (!snap) {
      logger.warn("Skipping unreadable session snapshot", { sessionId: row.id });
      continue;
    }
    out.push(snap);
  }
  return out;
}

async function upsertSession(c: PoolClient, snapshot: SessionSnapshot): Promise<void> {
  await c.query(
    `INSERT INTO balance_sessions(id, guild_id, channel_id, created_at, snapshot)
     VALUES($1,$2,$3,$4,$5)
     ON CONFLICT (id) DO UPDATE
     SET snapshot = EXCLUDED.snapshot, updated_at = NOW()`,
    [
      snapshot.sessionId,
      snapshot.location.guildId,
      snapshot.location.channelId,
      snapshot.createdAt,
      JSON.stringify(snapshot),
    ]
  );
}

async function deleteSession(c: PoolClient, sessionId: string): Promise<number> {
  const res = await c.query(`DELETE FROM balance_sessions WHERE id = $1`, [sessionId]);
  return res.rowCount ?? 0;
}
