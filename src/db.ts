import { Pool, PoolClient } from "pg";

export function createPool(connectionString: string): Pool {
  return new Pool({ connectionString });
}

export async function withTx<T>(pool: Pool, fn: (c: PoolClient) => Promise<T>): Promise<T> {
  const c = await pool.connect();
  try {
    await c.query("BEGIN");
    const res = await fn(c);
    await c.query("COMMIT");
    return res;
  } catch (e) {
    try {
      await c.query("ROLLBACK");
    } catch (rollbackError) {
      console.error("ROLLBACK failed", rollbackError);
    }
    throw e;
  } finally {
    c.release();
  }
}

export async function initSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS balance_sessions (
      id TEXT PRIMARY KEY,
      guild_id TEXT NOT NULL,
      channel_id TEXT NOT NULL,
      created_at BIGINT NOT NULL, -- epoch seconds, copied from the snapshot
      snapshot JSONB NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS balance_sessions_channel_created_idx
      ON balance_sessions(guild_id, channel_id, created_at DESC);

    CREATE TABLE IF NOT EXISTS identity_links (
      user_id TEXT PRIMARY KEY, -- discord user id
      handle TEXT NOT NULL, -- faceit nickname
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}
