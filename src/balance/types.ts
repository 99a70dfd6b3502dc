export type SessionState =
  | "open"
  | "balancing"
  | "balanced"
  | "finalized"
  | "failed"
  | "cancelled"
  | "expired";

export const TERMINAL_STATES: readonly SessionState[] = [
  "finalized",
  "failed",
  "cancelled",
  "expired",
];

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.includes(state);
}

export type Member = {
  externalId: string; // discord user id
  displayName: string;
};

export type Participant = Member & {
  rating: number;
};

export type Team = readonly Participant[];

/** Where a session is rendered: one message in one guild channel. */
export type SessionLocation = {
  guildId: string;
  channelId: string;
  messageId: string;
};

export type Session = {
  sessionId: string;
  state: SessionState;
  capacity: number;
  roster: Member[];
  teamA: Participant[];
  teamB: Participant[];
  /** Members whose rating could not be resolved in the last balancing attempt. */
  failed: Member[];
  /** Tie shuffle seed of the last rebalance, if any. */
  seed: string | null;
  createdAt: number; // epoch seconds
  location: SessionLocation;
};

export type TeamStats = {
  totalRating: number;
  averageRating: number;
  size: number;
};

export type SessionView = {
  sessionId: string;
  state: SessionState;
  capacity: number;
  participantCount: number;
  participants: Member[];
  teamA: Participant[];
  teamB: Participant[];
  statsA: TeamStats;
  statsB: TeamStats;
  ratingGap: number;
  failed: Member[];
  seed: string | null;
  createdAt: number;
};

export type SessionErrorCode =
  | "SESSION_NOT_FOUND"
  | "SESSION_UNAVAILABLE"
  | "SESSION_TERMINAL"
  | "NOT_OPEN"
  | "NOT_LINKED"
  | "ALREADY_JOINED"
  | "FULL"
  | "NOT_MEMBER"
  | "WRONG_SIZE"
  | "ALREADY_BALANCED"
  | "NOT_BALANCED"
  | "PLAYER_NOT_FOUND";

export type SessionError =
  | { code: SessionErrorCode }
  | { code: "PARTIAL_FAILURE"; failedParticipants: Member[] };

/** Outcome of a state machine transition. */
export type Transition = { ok: true } | { ok: false; error: SessionError };

/** Outcome of a caller-facing session operation. */
export type SessionResult = { ok: true; view: SessionView } | { ok: false; error: SessionError };

export type TerminalReason = "cancelled" | "expired";
