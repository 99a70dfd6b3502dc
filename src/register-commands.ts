import { REST, Routes, SlashCommandBuilder } from "discord.js";
import { loadEnv } from "./env";
import { SESSION_COMMANDS } from "./commands";

const ENV = loadEnv();

const sessionCommands = SESSION_COMMANDS.map((name) =>
  new SlashCommandBuilder()
    .setName(name)
    .setDescription(
      name === "mix" ? "Mix and balance teams" : "Start a team balancing session"
    )
);

const commands = [
  ...sessionCommands,
  new SlashCommandBuilder()
    .setName("profile")
    .setDescription("Link your Discord account to your FACEIT account")
    .addStringOption((opt) =>
      opt.setName("faceit").setDescription("FACEIT username or profile URL").setRequired(true)
    ),
  new SlashCommandBuilder().setName("unlink").setDescription("Unlink your FACEIT account"),
  new SlashCommandBuilder().setName("myelo").setDescription("Check your current FACEIT ELO"),
  new SlashCommandBuilder().setName("help").setDescription("Show bot commands and usage"),
].map((c) => c.toJSON());

async function main() {
  const rest = new REST({ version: "10" }).setToken(ENV.DISCORD_TOKEN);

  if (ENV.DISCORD_GUILD_ID) {
    await rest.put(
      Routes.applicationGuildCommands(ENV.DISCORD_CLIENT_ID, ENV.DISCORD_GUILD_ID),
      { body: commands }
    );
    console.log(`Registered guild commands in ${ENV.DISCORD_GUILD_ID}`);
  } else {
    await rest.put(Routes.applicationCommands(ENV.DISCORD_CLIENT_ID), { body: commands });
    console.log("Registered global commands (may take time to propagate)");
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
