import { Participant, Team, TeamStats } from "./types";
import { shuffledIndices } from "./random";

export const DEFAULT_REQUIRED_PLAYERS = 10;

export class InvalidRosterSizeError extends Error {
  constructor(
    readonly actual: number,
    readonly required: number
  ) {
    super(`Expected ${required} players, got ${actual}`);
    this.name = "InvalidRosterSizeError";
  }
}

export type TeamPair = { teamA: Participant[]; teamB: Participant[] };

export type SwapResult = ({ ok: true } & TeamPair) | { ok: false; error: "PLAYER_NOT_FOUND" };

/**
 * Greedy split: participants sorted by rating (descending, stable) go one by
 * one to the team with the lower running total. A full team is skipped even
 * if its total is lower; on equal totals team A gets the player.
 */
export function balance(
  roster: readonly Participant[],
  requiredPlayers: number = DEFAULT_REQUIRED_PLAYERS
): TeamPair {
  if (roster.length !== requiredPlayers || requiredPlayers % 2 !== 0) {
    throw new InvalidRosterSizeError(roster.length, requiredPlayers);
  }
  const teamSize = requiredPlayers / 2;

  // Array.prototype.sort is stable, so equal ratings keep input order.
  const sorted = [...roster].sort((x, y) => y.rating - x.rating);

  const teamA: Participant[] = [];
  const teamB: Participant[] = [];
  let sumA = 0;
  let sumB = 0;

  for (const p of sorted) {
    if (teamA.length < teamSize && (teamB.length >= teamSize || sumA <= sumB)) {
      teamA.push(p);
      sumA += p.rating;
    } else {
      teamB.push(p);
      sumB += p.rating;
    }
  }

  return { teamA, teamB };
}

export function stats(team: Team): TeamStats {
  if (team.length === 0) return { totalRating: 0, averageRating: 0, size: 0 };
  const totalRating = team.reduce((s, p) => s + p.rating, 0);
  return {
    totalRating,
    averageRating: roundToTenth(totalRating / team.length),
    size: team.length,
  };
}

/** One decimal; exact halves (x.25, x.75) go to the even digit. */
function roundToTenth(x: number): number {
  if (Number.isInteger(x * 4) && !Number.isInteger(x * 2)) {
    const tenths = Math.floor(x * 10);
    return (tenths % 2 === 0 ? tenths : tenths + 1) / 10;
  }
  return Number(x.toFixed(1));
}

export function ratingGap(teamA: Team, teamB: Team): number {
  return Math.abs(stats(teamA).totalRating - stats(teamB).totalRating);
}

/** Lookups are team-scoped: idA must be in team A and idB in team B. */
export function swap(teamA: Team, teamB: Team, idA: string, idB: string): SwapResult {
  const i = teamA.findIndex((p) => p.externalId === idA);
  const j = teamB.findIndex((p) => p.externalId === idB);
  if (i < 0 || j < 0) return { ok: false, error: "PLAYER_NOT_FOUND" };

  const nextA = [...teamA];
  const nextB = [...teamB];
  nextA[i] = teamB[j];
  nextB[j] = teamA[i];
  return { ok: true, teamA: nextA, teamB: nextB };
}

/**
 * Recomputes the split from both teams. Deterministic for a given order; a
 * seed shuffles the combined roster first, which only changes how players
 * with equal ratings are distributed.
 */
export function rebalance(teamA: Team, teamB: Team, seed?: string): TeamPair {
  const all = [...teamA, ...teamB];
  const roster = seed ? shuffledIndices(all.length, seed).map((i) => all[i]) : all;
  return balance(roster, all.length);
}
