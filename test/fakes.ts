import { RatingLookup, SessionRenderer, StaleSurfaceError } from "../src/balance/ports";
import { SessionSnapshot } from "../src/balance/snapshot";
import { InMemorySessionStore } from "../src/balance/store";
import { Member, SessionLocation, SessionView, TerminalReason } from "../src/balance/types";
import { LogContext, Logger } from "../src/logger";

export class MemoryLogger implements Logger {
  readonly entries: { level: "info" | "warn" | "error"; message: string; context?: LogContext }[] =
    [];

  info(message: string, context?: LogContext): void {
    this.entries.push({ level: "info", message, context });
  }

  warn(message: string, context?: LogContext): void {
    this.entries.push({ level: "warn", message, context });
  }

  error(message: string, context?: LogContext): void {
    this.entries.push({ level: "error", message, context });
  }

  messages(level: "info" | "warn" | "error"): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

export class FakeRenderer implements SessionRenderer {
  readonly views: { location: SessionLocation; view: SessionView }[] = [];
  readonly terminals: { location: SessionLocation; reason: TerminalReason }[] = [];
  readonly resolved: string[] = [];
  /** Message ids whose surface no longer exists. */
  readonly gone = new Set<string>();
  /** Message ids whose lookup throws something other than a stale error. */
  readonly broken = new Set<string>();
  /** Message ids whose edits fail with something other than a stale error. */
  readonly failing = new Set<string>();

  async renderSession(location: SessionLocation, view: SessionView): Promise<void> {
    this.check(location);
    this.views.push({ location, view });
  }

  async renderTerminal(location: SessionLocation, reason: TerminalReason): Promise<void> {
    this.check(location);
    this.terminals.push({ location, reason });
  }

  async resolveLocation(location: SessionLocation): Promise<boolean> {
    this.resolved.push(location.messageId);
    if (this.broken.has(location.messageId)) throw new Error("gateway unavailable");
    return !this.gone.has(location.messageId);
  }

  states(): string[] {
    return this.views.map((v) => v.view.state);
  }

  private check(location: SessionLocation): void {
    if (this.gone.has(location.messageId)) throw new StaleSurfaceError(location);
    if (this.failing.has(location.messageId)) throw new Error("edit timed out");
  }
}

export class FakeRatings implements RatingLookup {
  readonly ratings = new Map<string, number>();
  readonly delays = new Map<string, number>();
  readonly failing = new Set<string>();
  inFlight = 0;
  maxInFlight = 0;

  async resolveRating(handle: string): Promise<number | null> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, this.delays.get(handle) ?? 1));
      if (this.failing.has(handle)) throw new Error(`rating service down for ${handle}`);
      return this.ratings.get(handle) ?? null;
    } finally {
      this.inFlight--;
    }
  }

  async verifyHandleExists(handle: string): Promise<boolean> {
    return this.ratings.has(handle);
  }
}

export class FailingSaveStore extends InMemorySessionStore {
  async save(_snapshot: SessionSnapshot): Promise<void> {
    throw new Error("disk full");
  }
}

/** Delays the next save by `holdMs`; later saves go straight through. */
export class HeldSaveStore extends InMemorySessionStore {
  holdMs = 0;

  async save(snapshot: SessionSnapshot): Promise<void> {
    const hold = this.holdMs;
    this.holdMs = 0;
    if (hold > 0) await new Promise((resolve) => setTimeout(resolve, hold));
    await super.save(snapshot);
  }
}

export function member(id: string): Member {
  return { externalId: id, displayName: `Player ${id}` };
}

export const LOCATION: SessionLocation = {
  guildId: "guild-1",
  channelId: "channel-1",
  messageId: "message-1",
};

export function makeSnapshot(overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    sessionId: "s-1",
    state: "open",
    capacity: 4,
    participants: [
      { externalId: "u1", displayName: "Player u1", rating: null },
      { externalId: "u2", displayName: "Player u2", rating: null },
    ],
    teamA: [],
    teamB: [],
    failed: [],
    seed: null,
    createdAt: 1_000,
    location: { guildId: "guild-1", channelId: "channel-1" },
    surface: { messageId: "message-1" },
    ...overrides,
  };
}
