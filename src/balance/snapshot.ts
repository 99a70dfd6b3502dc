import { z } from "zod";
import { Session } from "./types";

const memberSchema = z.object({
  externalId: z.string().min(1),
  displayName: z.string(),
});

const participantSchema = memberSchema.extend({
  rating: z.number().int().nonnegative(),
});

export const snapshotSchema = z.object({
  sessionId: z.string().min(1),
  state: z.enum(["open", "balancing", "balanced", "finalized", "failed", "cancelled", "expired"]),
  capacity: z.number().int().positive(),
  participants: z.array(
    memberSchema.extend({ rating: z.number().int().nonnegative().nullable() })
  ),
  teamA: z.array(participantSchema),
  teamB: z.array(participantSchema),
  failed: z.array(memberSchema),
  seed: z.string().nullable(),
  createdAt: z.number().int().nonnegative(), // epoch seconds
  location: z.object({ guildId: z.string().min(1), channelId: z.string().min(1) }),
  surface: z.object({ messageId: z.string().min(1) }),
});

export type SessionSnapshot = z.infer<typeof snapshotSchema>;

export function toSnapshot(s: Session): SessionSnapshot {
  const ratings = new Map<string, number>();
  for (const p of [...s.teamA, ...s.teamB]) ratings.set(p.externalId, p.rating);

  return {
    sessionId: s.sessionId,
    state: s.state,
    capacity: s.capacity,
    participants: s.roster.map((m) => ({
      externalId: m.externalId,
      displayName: m.displayName,
      rating: ratings.get(m.externalId) ?? null,
    })),
    teamA: s.teamA.map((p) => ({ ...p })),
    teamB: s.teamB.map((p) => ({ ...p })),
    failed: s.failed.map((m) => ({ ...m })),
    seed: s.seed,
    createdAt: s.createdAt,
    location: { guildId: s.location.guildId, channelId: s.location.channelId },
    surface: { messageId: s.location.messageId },
  };
}

export function fromSnapshot(snap: SessionSnapshot): Session {
  return {
    sessionId: snap.sessionId,
    state: snap.state,
    capacity: snap.capacity,
    roster: snap.participants.map((p) => ({
      externalId: p.externalId,
      displayName: p.displayName,
    })),
    teamA: snap.teamA.map((p) => ({ ...p })),
    teamB: snap.teamB.map((p) => ({ ...p })),
    failed: snap.failed.map((m) => ({ ...m })),
    seed: snap.seed,
    createdAt: snap.createdAt,
    location: {
      guildId: snap.location.guildId,
      channelId: snap.location.channelId,
      messageId: snap.surface.messageId,
    },
  };
}

export function parseSnapshot(raw: unknown): SessionSnapshot | null {
  const parsed = snapshotSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function snapshotExpired(snap: SessionSnapshot, nowMs: number, ttlSeconds: number): boolean {
  return nowMs >= (snap.createdAt + ttlSeconds) * 1000;
}
