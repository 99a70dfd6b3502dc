import { SessionManager } from "../src/balance/sessions";
import { InMemorySessionStore } from "../src/balance/store";
import { InMemoryIdentityLinks } from "../src/identity/links";
import { FakeRatings, FakeRenderer, makeSnapshot, member, MemoryLogger } from "./fakes";

// 2010 seconds after the epoch: snapshots created at 1000 or 2000 are live, 100 has expired.
const NOW = 2_010_000;

describe("session recovery", () => {
  let store: InMemorySessionStore;
  let renderer: FakeRenderer;
  let logger: MemoryLogger;
  let identities: InMemoryIdentityLinks;
  let managers: SessionManager[];

  function manager(): SessionManager {
    const m = new SessionManager({
      store,
      identities,
      ratings: new FakeRatings(),
      renderer,
      logger,
      capacity: 4,
      ttlSeconds: 1800,
      lookupTimeoutMs: 50,
      renderTimeoutMs: 50,
      now: () => NOW,
    });
    managers.push(m);
    return m;
  }

  beforeEach(() => {
    store = new InMemorySessionStore();
    renderer = new FakeRenderer();
    logger = new MemoryLogger();
    identities = new InMemoryIdentityLinks();
    managers = [];
  });

  afterEach(() => {
    for (const m of managers) m.dispose();
  });

  it("keeps only the newest session of a channel", async () => {
    await store.save(
      makeSnapshot({ sessionId: "s-old", createdAt: 1_000, surface: { messageId: "m-old" } })
    );
    await store.save(
      makeSnapshot({ sessionId: "s-new", createdAt: 2_000, surface: { messageId: "m-new" } })
    );
    renderer.gone.add("m-old");

    const report = await manager().runRecovery();

    expect(report).toEqual({ reattached: 1, discarded: 1 });
    const remaining = await store.list();
    expect(remaining).toHaveLength(1);
    expect(remaining[0].sessionId).not.toBe("s-new");
    expect(remaining[0].createdAt).toBe(2_000);
    expect(remaining[0].surface).toEqual({ messageId: "m-new" });
    expect(renderer.views.map((v) => v.location.messageId)).toEqual(["m-new"]);
  });

  it("does not fall back to an older session when the newest is unresolvable", async () => {
    await store.save(
      makeSnapshot({ sessionId: "s-old", createdAt: 1_000, surface: { messageId: "m-old" } })
    );
    await store.save(
      makeSnapshot({ sessionId: "s-new", createdAt: 2_000, surface: { messageId: "m-new" } })
    );
    renderer.gone.add("m-new");

    const report = await manager().runRecovery();

    expect(report).toEqual({ reattached: 0, discarded: 2 });
    expect(await store.list()).toEqual([]);
  });

  it("discards expired snapshots without touching their message", async () => {
    await store.save(
      makeSnapshot({
        sessionId: "s-exp",
        createdAt: 100,
        location: { guildId: "guild-1", channelId: "channel-2" },
        surface: { messageId: "m-exp" },
      })
    );

    const report = await manager().runRecovery();

    expect(report).toEqual({ reattached: 0, discarded: 1 });
    expect(renderer.resolved).toEqual([]);
    expect(await store.get("s-exp")).toBeNull();
  });

  it("deletes snapshots it cannot read", async () => {
    store = new InMemorySessionStore([
      ["s-bad", { sessionId: "s-bad" }],
      ["s-1", makeSnapshot()],
    ]);

    expect(await manager().runRecovery()).toEqual({ reattached: 1, discarded: 1 });
    expect(logger.messages("warn")).toContain("Deleted unreadable session snapshots");
    expect(await store.get("s-bad")).toBeNull();
    expect(await store.list()).toHaveLength(1);
  });

  it("discards snapshots of sessions that already ended", async () => {
    await store.save(makeSnapshot({ state: "cancelled" }));

    expect(await manager().runRecovery()).toEqual({ reattached: 0, discarded: 1 });
    expect(await store.list()).toEqual([]);
  });

  it("discards a snapshot whose message cannot be looked up", async () => {
    await store.save(makeSnapshot());
    renderer.broken.add("message-1");

    expect(await manager().runRecovery()).toEqual({ reattached: 0, discarded: 1 });
    expect(logger.messages("warn")).toContain("Could not resolve session message");
  });

  it("reopens a session that was mid-balancing", async () => {
    await store.save(
      makeSnapshot({
        state: "balancing",
        participants: ["u1", "u2", "u3", "u4"].map((id) => ({
          externalId: id,
          displayName: `Player ${id}`,
          rating: null,
        })),
      })
    );

    await manager().runRecovery();

    const [snap] = await store.list();
    expect(snap.state).toBe("open");
    expect(snap.participants).toHaveLength(4);
  });

  it("reattaches one session per channel", async () => {
    await store.save(makeSnapshot({ sessionId: "s-a" }));
    await store.save(
      makeSnapshot({
        sessionId: "s-b",
        location: { guildId: "guild-1", channelId: "channel-2" },
        surface: { messageId: "message-2" },
      })
    );

    expect(await manager().runRecovery()).toEqual({ reattached: 2, discarded: 0 });
    expect(await store.list()).toHaveLength(2);
  });

  it("is idempotent", async () => {
    await store.save(makeSnapshot({ sessionId: "s-old", createdAt: 1_000 }));
    await store.save(makeSnapshot({ sessionId: "s-new", createdAt: 2_000 }));
    const m = manager();

    await m.runRecovery();
    const afterFirst = await store.list();

    expect(await m.runRecovery()).toEqual({ reattached: 0, discarded: 0 });
    expect(await store.list()).toEqual(afterFirst);
  });

  it("never duplicates a session across restarts", async () => {
    await store.save(makeSnapshot());

    await manager().runRecovery();
    await manager().runRecovery();

    expect(await store.list()).toHaveLength(1);
  });

  it("serves operations on a reattached session under its new id", async () => {
    await store.save(makeSnapshot());
    await identities.setLink("u3", "h-u3");
    const m = manager();
    await m.runRecovery();
    const [snap] = await store.list();

    const res = await m.join(snap.sessionId, member("u3"));

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.view.participants.map((p) => p.externalId)).toEqual(["u1", "u2", "u3"]);
    expect(await m.join("s-1", member("u3"))).toEqual({
      ok: false,
      error: { code: "SESSION_NOT_FOUND" },
    });
  });
});
