import { Client, GatewayIntentBits, Interaction } from "discord.js";
import { Pool } from "pg";
import { loadEnv } from "./env";
import { createPool, initSchema } from "./db";
import { PgSessionStore } from "./balance/db";
import { DiscordSessionRenderer } from "./balance/renderer";
import { SessionManager } from "./balance/sessions";
import { InMemorySessionStore, SessionStore } from "./balance/store";
import { BotContext, handleCommand, handleComponent } from "./commands";
import { PgIdentityLinks } from "./identity/db";
import { IdentityLinks, InMemoryIdentityLinks } from "./identity/links";
import { consoleLogger, errorContext } from "./logger";
import { FaceitClient } from "./rating/faceit";

const ENV = loadEnv();
const logger = consoleLogger;

const client = new Client({
  intents: [GatewayIntentBits.Guilds],
});

const pool: Pool | null = ENV.DATABASE_URL ? createPool(ENV.DATABASE_URL) : null;
if (!pool) {
  logger.warn("DATABASE_URL is not set: sessions and account links will not survive a restart");
}

const store: SessionStore = pool ? new PgSessionStore(pool, logger) : new InMemorySessionStore();
const identities: IdentityLinks = pool ? new PgIdentityLinks(pool) : new InMemoryIdentityLinks();

const faceit = new FaceitClient({
  apiKey: ENV.FACEIT_API_KEY,
  baseUrl: ENV.FACEIT_API_BASE_URL,
  game: ENV.FACEIT_GAME,
  timeoutMs: ENV.LOOKUP_TIMEOUT_MS,
  logger,
});

const sessions = new SessionManager({
  store,
  identities,
  ratings: faceit,
  renderer: new DiscordSessionRenderer(client, {
    warnAfterSeconds: ENV.SESSION_WARN_AFTER_SECONDS,
  }),
  logger,
  capacity: ENV.REQUIRED_PLAYERS,
  ttlSeconds: ENV.SESSION_TTL_SECONDS,
  lookupTimeoutMs: ENV.LOOKUP_TIMEOUT_MS,
  renderTimeoutMs: ENV.RENDER_TIMEOUT_MS,
  reshuffleTies: ENV.RESHUFFLE_TIES,
});

const ctx: BotContext = { sessions, identities, faceit, logger, capacity: ENV.REQUIRED_PLAYERS };

client.once("ready", async () => {
  logger.info(`Logged in as ${client.user?.tag}`);
  try {
    const report = await sessions.runRecovery();
    logger.info(`Recovered ${report.reattached} session(s), discarded ${report.discarded}`);
  } catch (e) {
    logger.error("Session recovery pass failed", errorContext(e));
  }
});

client.on("interactionCreate", async (interaction: Interaction) => {
  try {
    if (interaction.isChatInputCommand()) {
      await handleCommand(interaction, ctx);
      return;
    }
    if (interaction.isButton()) {
      await handleComponent(interaction, [], ctx);
      return;
    }
    if (interaction.isStringSelectMenu()) {
      await handleComponent(interaction, interaction.values, ctx);
    }
  } catch (e) {
    logger.error("Interaction failed", { interactionId: interaction.id, ...errorContext(e) });
    if (interaction.isRepliable()) {
      try {
        const content = hintFromDiscordError(e) ?? "Something went wrong.";
        if (interaction.deferred || interaction.replied) {
          await interaction.followUp({ content, ephemeral: true });
        } else {
          await interaction.reply({ content, ephemeral: true });
        }
      } catch (replyError) {
        logger.warn("Could not report interaction failure", errorContext(replyError));
      }
    }
  }
});

function hintFromDiscordError(e: unknown): string | null {
  const code = discordErrorCode(e);
  if (code === 50001) {
    return (
      "Missing Access (50001). The bot cannot see this channel or thread. " +
      "Check channel permissions: View Channel, Send Messages, Embed Links. " +
      "For threads also Send Messages in Threads."
    );
  }
  if (code === 50013) {
    return (
      "Missing Permissions (50013). Check channel permissions: " +
      "View Channel, Send Messages, Embed Links (and Read Message History if needed)."
    );
  }
  return null;
}

function discordErrorCode(e: unknown): unknown {
  if (typeof e !== "object" || e === null || !("code" in e)) return undefined;
  return e.code;
}

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down`);
  sessions.dispose();
  client.destroy().catch((e: unknown) => logger.error("Closing the gateway failed", errorContext(e)));
  if (pool) {
    pool.end().catch((e: unknown) => logger.error("Closing the pool failed", errorContext(e)));
  }
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

async function main(): Promise<void> {
  if (pool) await initSchema(pool);
  await client.login(ENV.DISCORD_TOKEN);
}

main().catch((e) => {
  logger.error("Startup failed", errorContext(e));
  process.exit(1);
});
