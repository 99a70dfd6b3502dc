import { FaceitApiError, FaceitClient } from "../src/rating/faceit";
import { MemoryLogger } from "./fakes";

type Call = { url: string; authorization: string | null };

function fakeFetch(status: number, body: unknown, calls: Call[] = []): typeof fetch {
  return async (input, init) => {
    calls.push({
      url: String(input),
      authorization: new Headers(init?.headers).get("authorization"),
    });
    return new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" },
    });
  };
}

function client(fetchImpl: typeof fetch, logger = new MemoryLogger()): FaceitClient {
  return new FaceitClient({
    apiKey: "test-key",
    baseUrl: "https://faceit.test/data/v4/",
    fetchImpl,
    logger,
  });
}

describe("FaceitClient", () => {
  it("reads the cs2 rating of a nickname", async () => {
    const calls: Call[] = [];
    const faceit = client(
      fakeFetch(200, { nickname: "some name", games: { cs2: { faceit_elo: 2100 } } }, calls)
    );

    expect(await faceit.resolveRating("some name")).toBe(2100);
    expect(calls).toEqual([
      {
        url: "https://faceit.test/data/v4/players?nickname=some%20name",
        authorization: "Bearer test-key",
      },
    ]);
  });

  it("falls back to csgo data", async () => {
    const faceit = client(fakeFetch(200, { games: { csgo: { faceit_elo: 1500 } } }));

    expect(await faceit.resolveRating("old-timer")).toBe(1500);
  });

  it("accepts ratings sent as strings", async () => {
    const faceit = client(fakeFetch(200, { games: { cs2: { faceit_elo: "1800.7" } } }));

    expect(await faceit.resolveRating("stringy")).toBe(1800);
  });

  it("has no rating without game data", async () => {
    expect(await client(fakeFetch(200, { nickname: "new" })).resolveRating("new")).toBeNull();
    expect(
      await client(fakeFetch(200, { games: { cs2: { faceit_elo: 0 } } })).resolveRating("zero")
    ).toBeNull();
  });

  it("treats 404 as an unknown player", async () => {
    const faceit = client(fakeFetch(404, { errors: [] }));

    expect(await faceit.resolveRating("ghost")).toBeNull();
    expect(await faceit.verifyHandleExists("ghost")).toBe(false);
  });

  it("logs other failed requests", async () => {
    const logger = new MemoryLogger();
    const faceit = client(fakeFetch(503, {}), logger);

    expect(await faceit.getPlayer("busy")).toBeNull();
    expect(logger.entries).toEqual([
      {
        level: "warn",
        message: "FACEIT player request failed",
        context: { nickname: "busy", status: 503 },
      },
    ]);
  });

  it("rejects payloads of the wrong shape", async () => {
    const faceit = client(fakeFetch(200, { games: "none" }));

    await expect(faceit.getPlayer("odd")).rejects.toBeInstanceOf(FaceitApiError);
  });

  it("summarizes a player's stats", async () => {
    const faceit = client(
      fakeFetch(200, {
        player_id: "p-1",
        nickname: "ace",
        avatar: "https://faceit.test/a.png",
        games: { cs2: { faceit_elo: 2350, skill_level: 10 } },
      })
    );

    expect(await faceit.getPlayerStats("ace")).toEqual({
      nickname: "ace",
      elo: 2350,
      level: 10,
      hasStats: true,
      playerId: "p-1",
      avatar: "https://faceit.test/a.png",
    });
  });

  it("reports a player without stats", async () => {
    const faceit = client(fakeFetch(200, { nickname: "rookie", games: {} }));

    expect(await faceit.getPlayerStats("rookie")).toEqual({
      nickname: "rookie",
      elo: null,
      level: null,
      hasStats: false,
    });
  });
});
