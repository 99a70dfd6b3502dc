import {
  ChatInputCommandInteraction,
  Colors,
  EmbedBuilder,
  GuildMember,
  MessageComponentInteraction,
} from "discord.js";
import { describeError, parseCustomId, renderSwapPicker } from "./balance/render";
import { SessionManager } from "./balance/sessions";
import { Member, SessionResult } from "./balance/types";
import { extractFaceitHandle } from "./identity/handle";
import { IdentityLinks } from "./identity/links";
import { Logger } from "./logger";
import { FaceitClient } from "./rating/faceit";

export const SESSION_COMMANDS = ["balance", "start", "mix"] as const;

export type BotContext = {
  sessions: SessionManager;
  identities: IdentityLinks;
  faceit: FaceitClient;
  logger: Logger;
  capacity: number;
};

export async function handleCommand(
  interaction: ChatInputCommandInteraction,
  ctx: BotContext
): Promise<void> {
  const name = interaction.commandName;
  if (SESSION_COMMANDS.some((c) => c === name)) return handleStart(interaction, ctx);
  if (name === "profile") return handleProfile(interaction, ctx);
  if (name === "unlink") return handleUnlink(interaction, ctx);
  if (name === "myelo") return handleMyElo(interaction, ctx);
  if (name === "help") return handleHelp(interaction, ctx);
}

async function handleStart(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void> {
  if (!interaction.inGuild()) {
    await interaction.reply({ content: "Use this command in a server.", ephemeral: true });
    return;
  }

  // The reply message is the session's surface, so it has to exist first.
  await interaction.reply({ content: "Creating session…" });
  const msg = await interaction.fetchReply();

  const res = await ctx.sessions.createSession({
    guildId: interaction.guildId,
    channelId: interaction.channelId,
    messageId: msg.id,
  });
  if (!res.ok) {
    await interaction.editReply({ content: describeError(res.error, ctx.capacity) });
  }
}

async function handleProfile(
  interaction: ChatInputCommandInteraction,
  ctx: BotContext
): Promise<void> {
  await interaction.deferReply({ ephemeral: true });

  const handle = extractFaceitHandle(interaction.options.getString("faceit", true));
  if (!handle || !(await ctx.faceit.verifyHandleExists(handle))) {
    await interaction.editReply(
      `❌ FACEIT account '${handle}' not found. Please check the username/URL and try again.`
    );
    return;
  }

  const stats = await ctx.faceit.getPlayerStats(handle);
  if (!stats?.hasStats) {
    await interaction.editReply(
      `⚠️ FACEIT account '${handle}' found, but no CS2 stats detected. ` +
        "Make sure you have played CS2 on FACEIT before linking."
    );
    return;
  }

  await ctx.identities.setLink(interaction.user.id, handle);
  ctx.logger.info("Linked FACEIT account", { userId: interaction.user.id, handle });

  const embed = new EmbedBuilder()
    .setTitle("✅ Account Linked!")
    .setDescription(`Successfully linked to FACEIT account: **${handle}**`)
    .setColor(Colors.Green)
    .addFields([
      { name: "Current ELO", value: `${stats.elo ?? "—"} ELO`, inline: true },
      { name: "Level", value: `Level ${stats.level ?? "—"}`, inline: true },
    ]);
  await interaction.editReply({ embeds: [embed] });
}

async function handleUnlink(
  interaction: ChatInputCommandInteraction,
  ctx: BotContext
): Promise<void> {
  const removed = await ctx.identities.removeLink(interaction.user.id);
  await interaction.reply({
    content: removed
      ? "✅ Your FACEIT account has been unlinked."
      : "❌ You don't have a linked FACEIT account.",
    ephemeral: true,
  });
}

async function handleMyElo(
  interaction: ChatInputCommandInteraction,
  ctx: BotContext
): Promise<void> {
  await interaction.deferReply({ ephemeral: true });

  const handle = await ctx.identities.getLinkedHandle(interaction.user.id);
  if (!handle) {
    await interaction.editReply(
      "❌ You haven't linked your FACEIT account yet! Use `/profile <faceit_username>`"
    );
    return;
  }

  const stats = await ctx.faceit.getPlayerStats(handle);
  if (!stats?.hasStats) {
    await interaction.editReply(
      "❌ Could not fetch your CS2 stats. Make sure you have CS2 games on FACEIT."
    );
    return;
  }

  const embed = new EmbedBuilder()
    .setTitle(`📊 ${handle}'s Stats`)
    .setColor(Colors.Blue)
    .addFields([
      { name: "Current ELO", value: `${stats.elo ?? "—"} ELO`, inline: true },
      { name: "Level", value: `Level ${stats.level ?? "—"}`, inline: true },
    ]);
  if (stats.avatar) embed.setThumbnail(stats.avatar);
  await interaction.editReply({ embeds: [embed] });
}

async function handleHelp(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void> {
  const embed = new EmbedBuilder()
    .setTitle("🤖 FACEIT Team Balancer")
    .setDescription("Balance teams based on FACEIT ELO for fair matches!")
    .setColor(Colors.Blue)
    .addFields([
      {
        name: "/profile <faceit_username_or_url>",
        value: "Link your Discord account to your FACEIT account (username or profile URL)",
      },
      { name: "/unlink", value: "Unlink your FACEIT account" },
      { name: "/myelo", value: "Check your current FACEIT ELO" },
      {
        name: "/balance, /start, /mix",
        value: `Start a team balancing session (needs ${ctx.capacity} players)`,
      },
    ])
    .setFooter({ text: "Made for fair LAN party matches!" });
  await interaction.reply({ embeds: [embed], ephemeral: true });
}

/** Buttons and select menus of a session message. `values` are the selected options. */
export async function handleComponent(
  interaction: MessageComponentInteraction,
  values: readonly string[],
  ctx: BotContext
): Promise<void> {
  const parsed = parseCustomId(interaction.customId);
  if (!parsed) return;

  if (!interaction.guildId) {
    await interaction.reply({ content: "Only available in a server.", ephemeral: true });
    return;
  }

  const { sessionId, action } = parsed;

  if (action === "pick") {
    // Opens a private Team B picker; the picked id rides in its custom id.
    const picked = values[0];
    const res = await ctx.sessions.view(sessionId);
    if (!picked || !res.ok) {
      const content = res.ok
        ? "❌ Please select one player from each team!"
        : describeError(res.error, ctx.capacity);
      await interaction.reply({ content, ephemeral: true });
      return;
    }
    await interaction.reply({
      content: "Who should they swap with?",
      components: renderSwapPicker(res.view, picked),
      ephemeral: true,
    });
    return;
  }

  await interaction.deferUpdate();

  if (action === "swap") {
    const other = values[0];
    const res =
      other && parsed.pickedId ? await ctx.sessions.swap(sessionId, parsed.pickedId, other) : null;
    await interaction.editReply({
      content: !res
        ? "❌ Please select one player from each team!"
        : res.ok
          ? "🔄 Players swapped."
          : describeError(res.error, ctx.capacity),
      components: [],
    });
    return;
  }

  const res = await runAction(action, sessionId, interaction, ctx);
  if (!res.ok) {
    await interaction.followUp({ content: describeError(res.error, ctx.capacity), ephemeral: true });
    return;
  }
  if (action === "cancel") {
    await interaction.followUp({ content: "Session cancelled!", ephemeral: true });
  }
}

function runAction(
  action: "join" | "leave" | "start" | "cancel" | "rebalance" | "finalize",
  sessionId: string,
  interaction: MessageComponentInteraction,
  ctx: BotContext
): Promise<SessionResult> {
  switch (action) {
    case "join":
      return ctx.sessions.join(sessionId, memberOf(interaction));
    case "leave":
      return ctx.sessions.leave(sessionId, interaction.user.id);
    case "start":
      return ctx.sessions.start(sessionId);
    case "cancel":
      return ctx.sessions.cancel(sessionId);
    case "rebalance":
      return ctx.sessions.rebalance(sessionId);
    case "finalize":
      return ctx.sessions.finalize(sessionId);
  }
}

function memberOf(interaction: MessageComponentInteraction): Member {
  const displayName =
    interaction.member instanceof GuildMember
      ? interaction.member.displayName
      : interaction.user.globalName ?? interaction.user.username;
  return { externalId: interaction.user.id, displayName };
}
