import { errorContext, Logger } from "../logger";
import { KeyedLock } from "../utils/keyed-lock";
import { withTimeout } from "../utils/timeout";
import { SessionStateMachine } from "./machine";
import { SessionRenderer } from "./ports";
import { newSessionId } from "./random";
import { fromSnapshot, SessionSnapshot, snapshotExpired, toSnapshot } from "./snapshot";
import { SessionStore } from "./store";
import { isTerminal } from "./types";

export type RecoveryReport = {
  reattached: number;
  discarded: number;
};

/** The live side of recovery, implemented by the session manager. */
export type RecoveryHost = {
  isLive(sessionId: string): boolean;
  attach(machine: SessionStateMachine): void;
};

export type RecoveryOptions = {
  store: SessionStore;
  renderer: SessionRenderer;
  logger: Logger;
  ttlSeconds: number;
  renderTimeoutMs: number;
  now: () => number;
};

type Outcome = "reattached" | "discarded" | "failed" | "skipped";

/**
 * Reattaches persisted sessions to their messages after a restart. Every
 * snapshot it looks at is either deleted or replaced by one under a new id,
 * so repeated passes never duplicate sessions.
 */
export class SessionRecovery {
  constructor(
    private readonly opts: RecoveryOptions,
    private readonly host: RecoveryHost,
    private readonly lock: KeyedLock
  ) {}

  async runRecovery(): Promise<RecoveryReport> {
    const { store, logger } = this.opts;
    const report: RecoveryReport = { reattached: 0, discarded: 0 };

    const purged = await store.purgeUnreadable();
    if (purged > 0) {
      logger.warn("Deleted unreadable session snapshots", { count: purged });
      report.discarded += purged;
    }

    const pending = (await store.list()).filter((s) => !this.host.isLive(s.sessionId));

    // Pick each channel's candidate before anything gets deleted: an older
    // snapshot must not take over when the newest one turns out unusable.
    const latest = new Map<string, string | null>();
    for (const snap of pending) {
      const key = channelKey(snap);
      if (latest.has(key)) continue;
      const newest = await store.latestInChannel(snap.location.guildId, snap.location.channelId);
      latest.set(key, newest?.sessionId ?? null);
    }

    for (const snap of pending) {
      const outcome = await this.lock.run(snap.sessionId, async (): Promise<Outcome> => {
        // Already settled by an on-demand recovery.
        const current = await store.get(snap.sessionId);
        if (!current) return "skipped";
        const res = await this.settle(current, latest.get(channelKey(snap)) === snap.sessionId);
        return res.outcome;
      });
      if (outcome === "reattached") report.reattached++;
      else if (outcome === "discarded") report.discarded++;
    }

    logger.info("Session recovery finished", report);
    return report;
  }

  /**
   * Recovers one snapshot on demand, e.g. when a click references a session
   * this process does not know. The caller holds the lock for `sessionId`.
   */
  async recoverById(sessionId: string): Promise<SessionStateMachine | null> {
    const { store } = this.opts;
    const snap = await store.get(sessionId);
    if (!snap) return null;

    const newest = await store.latestInChannel(snap.location.guildId, snap.location.channelId);
    const res = await this.settle(snap, newest?.sessionId === snap.sessionId);
    return res.machine;
  }

  private async settle(
    snap: SessionSnapshot,
    isLatest: boolean
  ): Promise<{ outcome: Outcome; machine: SessionStateMachine | null }> {
    const { logger, ttlSeconds, now } = this.opts;
    try {
      if (snapshotExpired(snap, now(), ttlSeconds)) return await this.discard(snap, "expired");
      if (!isLatest) return await this.discard(snap, "superseded");
      if (isTerminal(snap.state)) return await this.discard(snap, "terminal");
      if (!(await this.resolvable(snap))) return await this.discard(snap, "unresolvable");

      const machine = await this.reattach(snap);
      return { outcome: "reattached", machine };
    } catch (e) {
      logger.error("Session recovery failed", { sessionId: snap.sessionId, ...errorContext(e) });
      return { outcome: "failed", machine: null };
    }
  }

  private async discard(
    snap: SessionSnapshot,
    reason: string
  ): Promise<{ outcome: Outcome; machine: null }> {
    await this.opts.store.delete(snap.sessionId);
    this.opts.logger.info("Discarded session snapshot", { sessionId: snap.sessionId, reason });
    return { outcome: "discarded", machine: null };
  }

  private async resolvable(snap: SessionSnapshot): Promise<boolean> {
    const { renderer, renderTimeoutMs, logger } = this.opts;
    try {
      return await withTimeout(
        renderer.resolveLocation(fromSnapshot(snap).location),
        renderTimeoutMs,
        "resolveLocation"
      );
    } catch (e) {
      logger.warn("Could not resolve session message", {
        sessionId: snap.sessionId,
        ...errorContext(e),
      });
      return false;
    }
  }

  private async reattach(snap: SessionSnapshot): Promise<SessionStateMachine> {
    const { store, renderer, renderTimeoutMs, logger, now } = this.opts;
    const session = fromSnapshot(snap);
    const sessionId = newSessionId(session.location.guildId, session.location.channelId, now());
    const machine = SessionStateMachine.restore(session, sessionId);

    await store.replace(snap.sessionId, toSnapshot(machine.session()));
    this.host.attach(machine);
    logger.info("Reattached session", { from: snap.sessionId, to: sessionId });

    // New id means new component ids, so the message has to be redrawn.
    try {
      await withTimeout(
        renderer.renderSession(machine.location, machine.view()),
        renderTimeoutMs,
        "renderSession"
      );
    } catch (e) {
      logger.warn("Could not redraw recovered session", { sessionId, ...errorContext(e) });
    }
    return machine;
  }
}

function channelKey(snap: SessionSnapshot): string {
  return `${snap.location.guildId}:${snap.location.channelId}`;
}
