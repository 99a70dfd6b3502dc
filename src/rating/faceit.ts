import { z } from "zod";
import { RatingLookup } from "../balance/ports";
import { Logger } from "../logger";

const gameSchema = z.object({
  faceit_elo: z.coerce.number().optional(),
  skill_level: z.coerce.number().optional(),
});

const playerSchema = z.object({
  player_id: z.string().optional(),
  nickname: z.string().optional(),
  avatar: z.string().optional(),
  games: z.record(gameSchema).optional(),
});

export type FaceitPlayer = z.infer<typeof playerSchema>;

export type FaceitPlayerStats = {
  nickname: string;
  elo: number | null;
  level: number | null;
  hasStats: boolean;
  playerId?: string;
  avatar?: string;
};

export type FaceitClientOptions = {
  apiKey: string;
  baseUrl: string;
  /** Game key under `games`; CS:GO data is used when it is missing. */
  game?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger: Logger;
};

export class FaceitApiError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = "FaceitApiError";
  }
}

export class FaceitClient implements RatingLookup {
  private readonly baseUrl: string;
  private readonly games: string[];
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: FaceitClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    const game = options.game ?? "cs2";
    this.games = game === "csgo" ? [game] : [game, "csgo"];
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
  }

  /** Null for unknown nicknames and for non-200 answers (logged). */
  async getPlayer(nickname: string): Promise<FaceitPlayer | null> {
    const url = `${this.baseUrl}/players?nickname=${encodeURIComponent(nickname)}`;
    const res = await this.fetchImpl(url, {
      method: "GET",
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        Accept: "application/json",
      },
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 5000),
    });

    if (res.status === 404) return null;
    if (!res.ok) {
      this.options.logger.warn("FACEIT player request failed", {
        nickname,
        status: res.status,
      });
      return null;
    }

    const parsed = playerSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new FaceitApiError(`Unexpected FACEIT payload for ${nickname}`, res.status);
    }
    return parsed.data;
  }

  async resolveRating(handle: string): Promise<number | null> {
    const player = await this.getPlayer(handle);
    if (!player) return null;
    const elo = this.gameData(player)?.faceit_elo;
    return elo ? Math.trunc(elo) : null;
  }

  async verifyHandleExists(handle: string): Promise<boolean> {
    return (await this.getPlayer(handle)) !== null;
  }

  async getPlayerStats(handle: string): Promise<FaceitPlayerStats | null> {
    const player = await this.getPlayer(handle);
    if (!player) return null;

    const game = this.gameData(player);
    if (!game) return { nickname: handle, elo: null, level: null, hasStats: false };

    return {
      nickname: handle,
      elo: Math.trunc(game.faceit_elo ?? 0),
      level: Math.trunc(game.skill_level ?? 0),
      hasStats: true,
      playerId: player.player_id,
      avatar: player.avatar,
    };
  }

  private gameData(player: FaceitPlayer): z.infer<typeof gameSchema> | undefined {
    for (const g of this.games) {
      const data = player.games?.[g];
      if (data) return data;
    }
    return undefined;
  }
}
