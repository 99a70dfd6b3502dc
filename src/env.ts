import * as dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const flag = z
  .enum(["true", "false"])
  .optional()
  .transform((v) => v === "true");

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing env var: DISCORD_TOKEN"),
  DISCORD_CLIENT_ID: z.string().min(1, "Missing env var: DISCORD_CLIENT_ID"),
  DISCORD_GUILD_ID: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),

  FACEIT_API_KEY: z.string().min(1, "Missing env var: FACEIT_API_KEY"),
  FACEIT_API_BASE_URL: z.string().url().default("https://open.faceit.com/data/v4"),
  FACEIT_GAME: z.string().min(1).default("cs2"),

  REQUIRED_PLAYERS: z.coerce
    .number()
    .int()
    .min(2, "REQUIRED_PLAYERS must be >= 2")
    // A team select lists one team; Discord allows 25 options.
    .max(50, "REQUIRED_PLAYERS must be <= 50")
    .refine((n) => n % 2 === 0, "REQUIRED_PLAYERS must be even")
    .default(10),
  // Expiry timers are capped at 2^31-1 ms.
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().max(2_147_483).default(1800),
  SESSION_WARN_AFTER_SECONDS: z.coerce.number().int().positive().default(600),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  RESHUFFLE_TIES: flag,
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Empty strings in .env mean "unset".
  const cleaned: Record<string, string> = {};
  for (const [k, v] of Object.entries(source)) {
    if (v !== undefined && v !== "") cleaned[k] = v;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment:\n${issues.join("\n")}`);
  }
  return parsed.data;
}
