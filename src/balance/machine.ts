import { balance, rebalance, ratingGap, stats, swap } from "./engine";
import {
  isTerminal,
  Member,
  Participant,
  Session,
  SessionErrorCode,
  SessionLocation,
  SessionState,
  SessionView,
  Transition,
} from "./types";

const OK: Transition = { ok: true };

function fail(code: SessionErrorCode): Transition {
  return { ok: false, error: { code } };
}

/**
 * Lifecycle of one balancing session. Synchronous and free of I/O: rating
 * lookups, persistence and rendering are driven by the session manager.
 */
export class SessionStateMachine {
  private constructor(private readonly s: Session) {}

  static create(args: {
    sessionId: string;
    location: SessionLocation;
    capacity: number;
    createdAt: number;
  }): SessionStateMachine {
    return new SessionStateMachine({
      sessionId: args.sessionId,
      state: "open",
      capacity: args.capacity,
      roster: [],
      teamA: [],
      teamB: [],
      failed: [],
      seed: null,
      createdAt: args.createdAt,
      location: { ...args.location },
    });
  }

  /** Seeds a fresh machine from a stored session, usually under a new id. */
  static restore(session: Session, sessionId: string = session.sessionId): SessionStateMachine {
    // A balancing attempt cannot outlive the process that started it.
    const state: SessionState = session.state === "balancing" ? "open" : session.state;
    return new SessionStateMachine({
      ...session,
      sessionId,
      state,
      roster: session.roster.map((m) => ({ ...m })),
      teamA: session.teamA.map((p) => ({ ...p })),
      teamB: session.teamB.map((p) => ({ ...p })),
      failed: session.failed.map((m) => ({ ...m })),
      location: { ...session.location },
    });
  }

  get id(): string {
    return this.s.sessionId;
  }

  get state(): SessionState {
    return this.s.state;
  }

  get location(): SessionLocation {
    return this.s.location;
  }

  get createdAt(): number {
    return this.s.createdAt;
  }

  get roster(): readonly Member[] {
    return this.s.roster;
  }

  get isTerminal(): boolean {
    return isTerminal(this.s.state);
  }

  isExpired(nowMs: number, ttlSeconds: number): boolean {
    return nowMs >= (this.s.createdAt + ttlSeconds) * 1000;
  }

  join(member: Member, linked: boolean): Transition {
    if (this.isTerminal) return fail("SESSION_TERMINAL");
    if (this.s.state !== "open") return fail("NOT_OPEN");
    if (!linked) return fail("NOT_LINKED");
    if (this.s.roster.some((m) => m.externalId === member.externalId)) {
      return fail("ALREADY_JOINED");
    }
    if (this.s.roster.length >= this.s.capacity) return fail("FULL");

    this.s.roster = [...this.s.roster, { ...member }];
    return OK;
  }

  leave(externalId: string): Transition {
    if (this.isTerminal) return fail("SESSION_TERMINAL");
    if (this.s.state !== "open") return fail("NOT_OPEN");
    if (!this.s.roster.some((m) => m.externalId === externalId)) return fail("NOT_MEMBER");

    this.s.roster = this.s.roster.filter((m) => m.externalId !== externalId);
    return OK;
  }

  beginBalancing(): Transition {
    if (this.isTerminal) return fail("SESSION_TERMINAL");
    if (this.s.state === "balancing" || this.s.state === "balanced") {
      return fail("ALREADY_BALANCED");
    }
    if (this.s.roster.length !== this.s.capacity) return fail("WRONG_SIZE");

    this.s.state = "balancing";
    return OK;
  }

  /** Ratings resolved for the whole roster; ordering follows the roster. */
  completeBalancing(participants: Participant[]): Transition {
    if (this.s.state !== "balancing") return fail("NOT_BALANCED");

    const { teamA, teamB } = balance(participants, this.s.capacity);
    this.s.teamA = teamA;
    this.s.teamB = teamB;
    this.s.failed = [];
    this.s.state = "balanced";
    return OK;
  }

  failBalancing(failed: Member[]): Transition {
    if (this.s.state !== "balancing") return fail("NOT_BALANCED");

    this.s.failed = failed.map((m) => ({ ...m }));
    this.s.state = "failed";
    return OK;
  }

  swap(idA: string, idB: string): Transition {
    if (this.isTerminal) return fail("SESSION_TERMINAL");
    if (this.s.state !== "balanced") return fail("NOT_BALANCED");

    const res = swap(this.s.teamA, this.s.teamB, idA, idB);
    if (!res.ok) return fail(res.error);
    this.s.teamA = res.teamA;
    this.s.teamB = res.teamB;
    return OK;
  }

  rebalance(seed?: string): Transition {
    if (this.isTerminal) return fail("SESSION_TERMINAL");
    if (this.s.state !== "balanced") return fail("NOT_BALANCED");

    const { teamA, teamB } = rebalance(this.s.teamA, this.s.teamB, seed);
    this.s.teamA = teamA;
    this.s.teamB = teamB;
    this.s.seed = seed ?? null;
    return OK;
  }

  finalize(): Transition {
    if (this.isTerminal) return fail("SESSION_TERMINAL");
    if (this.s.state !== "balanced") return fail("NOT_BALANCED");

    this.s.state = "finalized";
    return OK;
  }

  cancel(): Transition {
    if (this.isTerminal) return fail("SESSION_TERMINAL");
    this.s.state = "cancelled";
    return OK;
  }

  expire(): Transition {
    if (this.isTerminal) return fail("SESSION_TERMINAL");
    this.s.state = "expired";
    return OK;
  }

  view(): SessionView {
    const s = this.s;
    return {
      sessionId: s.sessionId,
      state: s.state,
      capacity: s.capacity,
      participantCount: s.roster.length,
      participants: s.roster.map((m) => ({ ...m })),
      teamA: s.teamA.map((p) => ({ ...p })),
      teamB: s.teamB.map((p) => ({ ...p })),
      statsA: stats(s.teamA),
      statsB: stats(s.teamB),
      ratingGap: ratingGap(s.teamA, s.teamB),
      failed: s.failed.map((m) => ({ ...m })),
      seed: s.seed,
      createdAt: s.createdAt,
    };
  }

  /** Detached copy of the current session. */
  session(): Session {
    return {
      ...this.s,
      roster: this.s.roster.map((m) => ({ ...m })),
      teamA: this.s.teamA.map((p) => ({ ...p })),
      teamB: this.s.teamB.map((p) => ({ ...p })),
      failed: this.s.failed.map((m) => ({ ...m })),
      location: { ...this.s.location },
    };
  }
}
