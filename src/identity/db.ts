import { Pool } from "pg";
import { IdentityLinks } from "./links";

export class PgIdentityLinks implements IdentityLinks {
  constructor(private readonly pool: Pool) {}

  async getLinkedHandle(userId: string): Promise<string | null> {
    const res = await this.pool.query<{ handle: string }>(
      `SELECT handle FROM identity_links WHERE user_id = $1`,
      [userId]
    );
    return res.rows[0]?.handle ?? null;
  }

  async setLink(userId: string, handle: string): Promise<void> {
    await this.pool.query(
      `INSERT INTO identity_links(user_id, handle)
       VALUES($1,$2)
       ON CONFLICT (user_id) DO UPDATE
       SET handle = EXCLUDED.handle, updated_at = NOW()`,
      [userId, handle]
    );
  }

  async removeLink(userId: string): Promise<boolean> {
    const res = await this.pool.query(`DELETE FROM identity_links WHERE user_id = $1`, [userId]);
    return (res.rowCount ?? 0) > 0;
  }
}
