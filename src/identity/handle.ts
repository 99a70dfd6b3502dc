const PROFILE_URL_RE = /https?:\/\/(?:www\.)?faceit\.com\/(?:[a-z]{2}\/)?players?\/([^/?#\s]+)/i;

/** Accepts a FACEIT nickname or a profile URL. */
export function extractFaceitHandle(input: string): string {
  const m = PROFILE_URL_RE.exec(input);
  if (m) return decodeURIComponent(m[1]);

  const name = input.trim();
  return name.startsWith("@") ? name.slice(1) : name;
}
