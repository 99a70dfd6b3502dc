export function shuffledIndices(n: number, seed: string): number[] {
  const rng = mulberry32(hashStringToU32(seed));
  const arr = Array.from({ length: n }, (_, i) => i);
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}

export function hashStringToU32(s: string): number {
  // FNV-1a 32-bit
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function mulberry32(a: number): () => number {
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function newSuffix(): string {
  // small and human-ish: 4 chars base36
  const n = Math.floor(Math.random() * 36 ** 4);
  return n.toString(36).padStart(4, "0");
}

/** Session ids are short enough to carry a user id inside a component custom id. */
export function newSessionId(guildId: string, channelId: string, nowMs: number): string {
  const place = hashStringToU32(`${guildId}:${channelId}`).toString(36);
  return `${place}${nowMs.toString(36)}${newSuffix()}`;
}
