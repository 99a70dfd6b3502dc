import { SessionLocation, SessionView, TerminalReason } from "./types";

export type RatingLookup = {
  /** Null when the handle is unknown or has no rating for the configured game. */
  resolveRating(handle: string): Promise<number | null>;
  verifyHandleExists(handle: string): Promise<boolean>;
};

/**
 * Where sessions are shown. Implementations re-render idempotently and throw
 * StaleSurfaceError once the surface no longer exists.
 */
export type SessionRenderer = {
  renderSession(location: SessionLocation, view: SessionView): Promise<void>;
  renderTerminal(location: SessionLocation, reason: TerminalReason): Promise<void>;
  resolveLocation(location: SessionLocation): Promise<boolean>;
};

export class StaleSurfaceError extends Error {
  constructor(readonly location: SessionLocation) {
    super(`Session message ${location.messageId} in channel ${location.channelId} is gone`);
    this.name = "StaleSurfaceError";
  }
}
