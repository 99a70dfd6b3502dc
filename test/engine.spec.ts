import {
  balance,
  InvalidRosterSizeError,
  rebalance,
  ratingGap,
  stats,
  swap,
} from "../src/balance/engine";
import { Participant } from "../src/balance/types";

function p(id: string, rating: number): Participant {
  return { externalId: id, displayName: `Player ${id}`, rating };
}

function ids(team: readonly Participant[]): string[] {
  return team.map((x) => x.externalId);
}

describe("balance", () => {
  it("splits four players with the greedy rule", () => {
    const { teamA, teamB } = balance([p("a", 100), p("b", 90), p("c", 80), p("d", 70)], 4);

    expect(ids(teamA)).toEqual(["a", "d"]);
    expect(ids(teamB)).toEqual(["b", "c"]);
    expect(ratingGap(teamA, teamB)).toBe(0);
  });

  it("splits a ten-player roster regardless of input order", () => {
    const roster = [
      p("j", 1100),
      p("a", 2000),
      p("e", 1600),
      p("b", 1900),
      p("i", 1200),
      p("c", 1800),
      p("h", 1300),
      p("d", 1700),
      p("g", 1400),
      p("f", 1500),
    ];

    const { teamA, teamB } = balance(roster);

    expect(ids(teamA)).toEqual(["a", "d", "e", "h", "i"]);
    expect(ids(teamB)).toEqual(["b", "c", "f", "g", "j"]);
    expect(stats(teamA)).toEqual({ totalRating: 7800, averageRating: 1560, size: 5 });
    expect(stats(teamB)).toEqual({ totalRating: 7700, averageRating: 1540, size: 5 });
  });

  it("keeps input order for equal ratings", () => {
    const first = balance([p("x1", 100), p("x2", 100), p("x3", 50), p("x4", 50)], 4);
    expect(ids(first.teamA)).toEqual(["x1", "x3"]);
    expect(ids(first.teamB)).toEqual(["x2", "x4"]);

    const reversed = balance([p("x2", 100), p("x1", 100), p("x4", 50), p("x3", 50)], 4);
    expect(ids(reversed.teamA)).toEqual(["x2", "x4"]);
    expect(ids(reversed.teamB)).toEqual(["x1", "x3"]);
  });

  it("fills the other team once one side is full", () => {
    const { teamA, teamB } = balance([p("w", 1000), p("x", 10), p("y", 10), p("z", 10)], 4);

    expect(ids(teamA)).toEqual(["w", "z"]);
    expect(ids(teamB)).toEqual(["x", "y"]);
  });

  it("rejects a roster of the wrong size", () => {
    const nine = Array.from({ length: 9 }, (_, i) => p(`u${i}`, 1000 + i));
    expect(() => balance(nine)).toThrow(InvalidRosterSizeError);
    expect(() => balance(nine)).toThrow("Expected 10 players, got 9");
  });

  it("rejects an odd required size", () => {
    expect(() => balance([p("a", 1), p("b", 2), p("c", 3)], 3)).toThrow(InvalidRosterSizeError);
  });

  it("partitions every roster into two equal teams", () => {
    let x = 7;
    const next = () => {
      x = (x * 1103515245 + 12345) % 2147483648;
      return x % 3000;
    };

    for (let round = 0; round < 20; round++) {
      const roster = Array.from({ length: 10 }, (_, i) => p(`r${round}-${i}`, next()));
      const { teamA, teamB } = balance(roster);

      expect(teamA).toHaveLength(5);
      expect(teamB).toHaveLength(5);
      expect([...ids(teamA), ...ids(teamB)].sort()).toEqual(ids(roster).sort());
    }
  });
});

describe("stats", () => {
  it("reports zeros for an empty team", () => {
    expect(stats([])).toEqual({ totalRating: 0, averageRating: 0, size: 0 });
  });

  it("rounds the average to one decimal", () => {
    expect(stats([p("a", 100), p("b", 91), p("c", 80)])).toEqual({
      totalRating: 271,
      averageRating: 90.3,
      size: 3,
    });
    expect(stats([p("a", 1), p("b", 2)]).averageRating).toBe(1.5);
  });

  it("sends exact halves to the even digit", () => {
    expect(stats([p("a", 100), p("b", 90), p("c", 80), p("d", 71)]).averageRating).toBe(85.2);
    expect(stats([p("a", 100), p("b", 90), p("c", 80), p("d", 73)]).averageRating).toBe(85.8);
  });
});

describe("swap", () => {
  const teamA = [p("p1", 100), p("p2", 70)];
  const teamB = [p("p3", 90), p("p4", 80)];

  it("exchanges one player from each team", () => {
    const res = swap(teamA, teamB, "p2", "p3");

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(ids(res.teamA)).toEqual(["p1", "p3"]);
    expect(ids(res.teamB)).toEqual(["p2", "p4"]);
    expect(ids(teamA)).toEqual(["p1", "p2"]);
  });

  it("restores the original teams when swapped back", () => {
    const once = swap(teamA, teamB, "p2", "p3");
    if (!once.ok) throw new Error("first swap failed");
    const twice = swap(once.teamA, once.teamB, "p3", "p2");

    expect(twice).toEqual({ ok: true, teamA, teamB });
  });

  it("rejects ids on the wrong team", () => {
    expect(swap(teamA, teamB, "p3", "p2")).toEqual({ ok: false, error: "PLAYER_NOT_FOUND" });
  });

  it("rejects unknown ids", () => {
    expect(swap(teamA, teamB, "p1", "zz")).toEqual({ ok: false, error: "PLAYER_NOT_FOUND" });
  });
});

describe("rebalance", () => {
  it("reproduces the balanced split for distinct ratings", () => {
    const first = balance([p("a", 100), p("b", 90), p("c", 80), p("d", 70)], 4);

    expect(rebalance(first.teamA, first.teamB)).toEqual(first);
  });

  it("undoes a manual swap", () => {
    const first = balance([p("a", 100), p("b", 90), p("c", 80), p("d", 70)], 4);
    const swapped = swap(first.teamA, first.teamB, "a", "b");
    if (!swapped.ok) throw new Error("swap failed");

    expect(rebalance(swapped.teamA, swapped.teamB)).toEqual(first);
  });

  it("ignores the seed when no ratings are equal", () => {
    const first = balance([p("a", 100), p("b", 90), p("c", 80), p("d", 70)], 4);

    expect(rebalance(first.teamA, first.teamB, "seed-1")).toEqual(first);
  });

  it("keeps teams equal in size with a seed and tied ratings", () => {
    const teamA = [p("a", 50), p("c", 50)];
    const teamB = [p("b", 50), p("d", 50)];

    const res = rebalance(teamA, teamB, "abc");

    expect(res.teamA).toHaveLength(2);
    expect(res.teamB).toHaveLength(2);
    expect([...ids(res.teamA), ...ids(res.teamB)].sort()).toEqual(["a", "b", "c", "d"]);
  });
});
