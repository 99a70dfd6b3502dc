import { randomUUID } from "crypto";
import { IdentityLinks } from "../identity/links";
import { errorContext, Logger } from "../logger";
import { KeyedLock } from "../utils/keyed-lock";
import { withTimeout } from "../utils/timeout";
import { SessionStateMachine } from "./machine";
import { RatingLookup, SessionRenderer, StaleSurfaceError } from "./ports";
import { newSessionId } from "./random";
import { RecoveryReport, SessionRecovery } from "./recovery";
import { toSnapshot } from "./snapshot";
import { SessionStore } from "./store";
import {
  Member,
  Participant,
  SessionError,
  SessionLocation,
  SessionResult,
  Transition,
} from "./types";

export type SessionManagerOptions = {
  store: SessionStore;
  identities: IdentityLinks;
  ratings: RatingLookup;
  renderer: SessionRenderer;
  logger: Logger;
  capacity: number;
  ttlSeconds: number;
  lookupTimeoutMs: number;
  renderTimeoutMs: number;
  /** Shuffle equal ratings on every rebalance. Off: rebalance is deterministic. */
  reshuffleTies?: boolean;
  now?: () => number;
  newSeed?: () => string;
};

type LiveSession = {
  machine: SessionStateMachine;
  timer: NodeJS.Timeout;
};

type Resolution = { member: Member; rating: number | null };

type RenderOutcome = "shown" | "gone" | "failed";

// Node clamps longer timer delays to 1ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

function failure(error: SessionError): SessionResult {
  return { ok: false, error };
}

/**
 * Caller-facing session operations. Work on one session is serialized by a
 * keyed lock; every accepted transition is persisted and rendered before the
 * new view is returned.
 */
export class SessionManager {
  private readonly live = new Map<string, LiveSession>();
  private readonly lock = new KeyedLock();
  private readonly recovery: SessionRecovery;
  private readonly now: () => number;
  private readonly newSeed: () => string;

  constructor(private readonly opts: SessionManagerOptions) {
    this.now = opts.now ?? (() => Date.now());
    this.newSeed = opts.newSeed ?? (() => randomUUID().slice(0, 8));
    this.recovery = new SessionRecovery(
      {
        store: opts.store,
        renderer: opts.renderer,
        logger: opts.logger,
        ttlSeconds: opts.ttlSeconds,
        renderTimeoutMs: opts.renderTimeoutMs,
        now: this.now,
      },
      {
        isLive: (id) => this.live.has(id),
        attach: (machine) => this.attach(machine),
      },
      this.lock
    );
  }

  async createSession(location: SessionLocation): Promise<SessionResult> {
    const nowMs = this.now();
    const machine = SessionStateMachine.create({
      sessionId: newSessionId(location.guildId, location.channelId, nowMs),
      location,
      capacity: this.opts.capacity,
      createdAt: Math.floor(nowMs / 1000),
    });

    return this.lock.run(machine.id, async () => {
      this.attach(machine);
      this.opts.logger.info("Session created", { sessionId: machine.id, ...location });
      await this.persist(machine);

      const shown = await this.render(machine);
      if (shown === "failed") await this.drop(machine, "Session message could not be drawn");
      if (shown !== "shown") return failure({ code: "SESSION_UNAVAILABLE" });
      return { ok: true, view: machine.view() };
    });
  }

  join(sessionId: string, member: Member): Promise<SessionResult> {
    return this.act(sessionId, async (m) => {
      const linked = await this.isLinked(member.externalId);
      return m.join(member, linked);
    });
  }

  leave(sessionId: string, userId: string): Promise<SessionResult> {
    return this.act(sessionId, (m) => m.leave(userId));
  }

  /**
   * Resolves every member's rating concurrently, then either balances the
   * teams or ends the attempt with a partial failure. The lock is held
   * throughout; each lookup is bounded by the lookup timeout.
   */
  start(sessionId: string): Promise<SessionResult> {
    return this.withSession(sessionId, async (m) => {
      const begun = m.beginBalancing();
      if (!begun.ok) return failure(begun.error);

      const shown = await this.commit(m);
      if (!shown.ok) return shown;

      const resolutions = await this.resolveRatings(m.roster);
      const failed = resolutions.filter((r) => r.rating === null).map((r) => r.member);

      if (failed.length > 0) {
        m.failBalancing(failed);
        this.opts.logger.warn("Rating resolution failed", {
          sessionId: m.id,
          failed: failed.map((f) => f.externalId),
        });
        await this.commit(m);
        return failure({ code: "PARTIAL_FAILURE", failedParticipants: failed });
      }

      const participants: Participant[] = resolutions.map((r) => ({
        ...r.member,
        rating: r.rating ?? 0,
      }));
      m.completeBalancing(participants);
      return this.commit(m);
    });
  }

  swap(sessionId: string, idA: string, idB: string): Promise<SessionResult> {
    return this.act(sessionId, (m) => m.swap(idA, idB));
  }

  rebalance(sessionId: string): Promise<SessionResult> {
    return this.act(sessionId, (m) =>
      m.rebalance(this.opts.reshuffleTies ? this.newSeed() : undefined)
    );
  }

  finalize(sessionId: string): Promise<SessionResult> {
    return this.act(sessionId, (m) => m.finalize());
  }

  cancel(sessionId: string): Promise<SessionResult> {
    return this.act(sessionId, (m) => m.cancel());
  }

  runRecovery(): Promise<RecoveryReport> {
    return this.recovery.runRecovery();
  }

  /** Current view; nothing is persisted or rendered unless the session just expired. */
  view(sessionId: string): Promise<SessionResult> {
    return this.withSession(sessionId, async (m) => ({ ok: true, view: m.view() }));
  }

  dispose(): void {
    for (const entry of this.live.values()) clearTimeout(entry.timer);
    this.live.clear();
  }

  private act(
    sessionId: string,
    apply: (m: SessionStateMachine) => Transition | Promise<Transition>
  ): Promise<SessionResult> {
    return this.withSession(sessionId, async (m) => {
      const t = await apply(m);
      if (!t.ok) return failure(t.error);
      return this.commit(m);
    });
  }

  /**
   * Runs `work` under the session's lock. A session recovered on demand
   * lives under a new id whose buttons are already drawn, so the work also
   * takes that id's lock.
   */
  private withSession(
    sessionId: string,
    work: (m: SessionStateMachine) => Promise<SessionResult>
  ): Promise<SessionResult> {
    return this.lock.run(sessionId, async () => {
      const m = await this.resolve(sessionId);
      if (!m) return failure({ code: "SESSION_NOT_FOUND" });
      if (m.id === sessionId) return this.runLive(m, work);
      return this.lock.run(m.id, () => this.runLive(m, work));
    });
  }

  private async runLive(
    m: SessionStateMachine,
    work: (m: SessionStateMachine) => Promise<SessionResult>
  ): Promise<SessionResult> {
    // Dropped while waiting for the lock.
    if (this.live.get(m.id)?.machine !== m) return failure({ code: "SESSION_NOT_FOUND" });
    if (await this.expireIfDue(m)) return failure({ code: "SESSION_TERMINAL" });
    return work(m);
  }

  private async resolve(sessionId: string): Promise<SessionStateMachine | null> {
    const entry = this.live.get(sessionId);
    if (entry) return entry.machine;
    return this.recovery.recoverById(sessionId);
  }

  private attach(machine: SessionStateMachine): void {
    const prev = this.live.get(machine.id);
    if (prev) clearTimeout(prev.timer);

    const dueMs = (machine.createdAt + this.opts.ttlSeconds) * 1000 - this.now();
    this.live.set(machine.id, { machine, timer: this.schedule(machine.id, dueMs) });
  }

  private schedule(sessionId: string, delayMs: number): NodeJS.Timeout {
    const timer = setTimeout(() => {
      this.lock.run(sessionId, () => this.onTimer(sessionId)).catch((e: unknown) => {
        this.opts.logger.error("Session timer failed", { sessionId, ...errorContext(e) });
      });
    }, Math.min(Math.max(0, delayMs), MAX_TIMER_DELAY_MS));
    timer.unref();
    return timer;
  }

  /**
   * Fires once the ttl has elapsed: expires a session still in play, and
   * forgets an ended one (kept until then so late clicks get SESSION_TERMINAL).
   */
  private async onTimer(sessionId: string): Promise<void> {
    const entry = this.live.get(sessionId);
    if (!entry) return;

    if (entry.machine.isTerminal) {
      this.live.delete(sessionId);
      return;
    }

    const { ttlSeconds } = this.opts;
    if (!entry.machine.isExpired(this.now(), ttlSeconds)) {
      const dueMs = (entry.machine.createdAt + ttlSeconds) * 1000 - this.now();
      entry.timer = this.schedule(sessionId, dueMs);
      return;
    }

    entry.machine.expire();
    this.opts.logger.info("Session expired", { sessionId });
    await this.commit(entry.machine);
    if (this.live.has(sessionId)) {
      entry.timer = this.schedule(sessionId, this.opts.ttlSeconds * 1000);
    }
  }

  private async expireIfDue(m: SessionStateMachine): Promise<boolean> {
    if (m.isTerminal || !m.isExpired(this.now(), this.opts.ttlSeconds)) return false;
    m.expire();
    this.opts.logger.info("Session expired", { sessionId: m.id });
    await this.commit(m);
    return true;
  }

  private async isLinked(userId: string): Promise<boolean> {
    try {
      const handle = await withTimeout(
        this.opts.identities.getLinkedHandle(userId),
        this.opts.lookupTimeoutMs,
        "getLinkedHandle"
      );
      return handle !== null;
    } catch (e) {
      this.opts.logger.warn("Identity lookup failed", { userId, ...errorContext(e) });
      return false;
    }
  }

  private resolveRatings(roster: readonly Member[]): Promise<Resolution[]> {
    const { identities, ratings, lookupTimeoutMs, logger } = this.opts;
    return Promise.all(
      roster.map(async (member): Promise<Resolution> => {
        try {
          const handle = await withTimeout(
            identities.getLinkedHandle(member.externalId),
            lookupTimeoutMs,
            "getLinkedHandle"
          );
          if (!handle) return { member, rating: null };

          const rating = await withTimeout(
            ratings.resolveRating(handle),
            lookupTimeoutMs,
            "resolveRating"
          );
          if (rating === null || !Number.isInteger(rating) || rating < 0) {
            return { member, rating: null };
          }
          return { member, rating };
        } catch (e) {
          logger.warn("Rating lookup failed", {
            userId: member.externalId,
            ...errorContext(e),
          });
          return { member, rating: null };
        }
      })
    );
  }

  /**
   * Persists, then renders. Persistence failures are logged and the session
   * keeps running; a vanished message drops the session.
   */
  private async commit(m: SessionStateMachine): Promise<SessionResult> {
    await this.persist(m);
    if ((await this.render(m)) === "gone") return failure({ code: "SESSION_UNAVAILABLE" });
    return { ok: true, view: m.view() };
  }

  private async persist(m: SessionStateMachine): Promise<void> {
    try {
      if (m.isTerminal) await this.opts.store.delete(m.id);
      else await this.opts.store.save(toSnapshot(m.session()));
    } catch (e) {
      this.opts.logger.error("Failed to persist session", {
        sessionId: m.id,
        state: m.state,
        ...errorContext(e),
      });
    }
  }

  private async render(m: SessionStateMachine): Promise<RenderOutcome> {
    const { renderer, renderTimeoutMs, logger } = this.opts;
    try {
      const state = m.state;
      if (state === "cancelled" || state === "expired") {
        await withTimeout(
          renderer.renderTerminal(m.location, state),
          renderTimeoutMs,
          "renderTerminal"
        );
      } else {
        await withTimeout(
          renderer.renderSession(m.location, m.view()),
          renderTimeoutMs,
          "renderSession"
        );
      }
      return "shown";
    } catch (e) {
      if (e instanceof StaleSurfaceError) {
        await this.drop(m, "Session message is gone, dropping session");
        return "gone";
      }
      logger.warn("Failed to render session", { sessionId: m.id, ...errorContext(e) });
      return "failed";
    }
  }

  private async drop(m: SessionStateMachine, reason: string): Promise<void> {
    const entry = this.live.get(m.id);
    if (entry) clearTimeout(entry.timer);
    this.live.delete(m.id);
    this.opts.logger.warn(reason, { sessionId: m.id });
    try {
      await this.opts.store.delete(m.id);
    } catch (e) {
      this.opts.logger.error("Failed to delete session snapshot", {
        sessionId: m.id,
        ...errorContext(e),
      });
    }
  }
}
