import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  Colors,
  EmbedBuilder,
  escapeMarkdown,
  MessageActionRowComponentBuilder,
  StringSelectMenuBuilder,
} from "discord.js";
import { Participant, SessionError, SessionView, TeamStats, TerminalReason } from "./types";

export const CUSTOM_ID_PREFIX = "balance:v1";

export const SESSION_ACTIONS = [
  "join",
  "leave",
  "start",
  "cancel",
  "rebalance",
  "finalize",
  "pick",
  "swap",
] as const;

export type SessionAction = (typeof SESSION_ACTIONS)[number];

export type ParsedCustomId = {
  sessionId: string;
  action: SessionAction;
  /** Team A player picked for a swap. Only set for `swap`. */
  pickedId?: string;
};

export type RenderOptions = {
  nowMs: number;
  /** Sessions older than this get a "getting old" notice. */
  warnAfterSeconds: number;
};

export function customId(sessionId: string, action: SessionAction, pickedId?: string): string {
  const base = `${CUSTOM_ID_PREFIX}:${sessionId}:${action}`;
  return pickedId ? `${base}:${pickedId}` : base;
}

export function parseCustomId(raw: string): ParsedCustomId | null {
  const parts = raw.split(":");
  if (parts.length !== 4 && parts.length !== 5) return null;
  const [p0, p1, sessionId, action, pickedId] = parts;
  if (`${p0}:${p1}` !== CUSTOM_ID_PREFIX) return null;
  if (!sessionId) return null;
  const known = SESSION_ACTIONS.find((a) => a === action);
  if (!known) return null;

  if (known === "swap") {
    if (!pickedId) return null;
    return { sessionId, action: known, pickedId };
  }
  if (pickedId !== undefined) return null;
  return { sessionId, action: known };
}

export function renderEmbed(view: SessionView, opts: RenderOptions): EmbedBuilder {
  switch (view.state) {
    case "open":
      return renderOpen(view, opts);
    case "balancing":
      return new EmbedBuilder()
        .setTitle("⏳ Fetching ratings...")
        .setDescription("Please wait while I get everyone's current ELO.")
        .setColor(Colors.Blue)
        .setFooter({ text: `session ${view.sessionId}` });
    case "balanced":
      return renderTeams(view)
        .setTitle("⚖️ Balanced Teams")
        .setDescription(
          "Teams have been created! Pick a Team A player below to swap them with someone from Team B."
        )
        .setColor(Colors.Green);
    case "finalized":
      return renderTeams(view)
        .setTitle("✅ Teams Finalized!")
        .setDescription("Good luck and have fun!")
        .setColor(Colors.Gold);
    case "failed":
      return new EmbedBuilder()
        .setTitle("❌ Error Fetching ELOs")
        .setDescription(
          "Failed to get ELO for some players. They may not have stats on FACEIT. " +
            "Start a new session once they are sorted out."
        )
        .setColor(Colors.Red)
        .addFields([{ name: "Failed Players", value: renderMentionsOrDash(view.failed) }])
        .setFooter({ text: `session ${view.sessionId}` });
    case "cancelled":
    case "expired":
      return renderTerminalEmbed(view.state);
  }
}

export function renderTerminalEmbed(reason: TerminalReason): EmbedBuilder {
  if (reason === "expired") {
    return new EmbedBuilder()
      .setTitle("⏰ Session Expired")
      .setDescription(
        "This balancing session has expired. Please start a new one with `/balance`, `/start`, or `/mix`."
      )
      .setColor(Colors.Red);
  }
  return new EmbedBuilder()
    .setTitle("Session cancelled")
    .setDescription("Start a new one with `/balance`, `/start`, or `/mix`.")
    .setColor(Colors.Grey);
}

export function renderComponents(view: SessionView): ActionRowBuilder<MessageActionRowComponentBuilder>[] {
  if (view.state === "open") {
    const join = new ButtonBuilder()
      .setCustomId(customId(view.sessionId, "join"))
      .setStyle(ButtonStyle.Primary)
      .setEmoji("✋")
      .setLabel("Join Session");

    const leave = new ButtonBuilder()
      .setCustomId(customId(view.sessionId, "leave"))
      .setStyle(ButtonStyle.Secondary)
      .setEmoji("👋")
      .setLabel("Leave Session");

    const start = new ButtonBuilder()
      .setCustomId(customId(view.sessionId, "start"))
      .setStyle(ButtonStyle.Success)
      .setEmoji("⚖️")
      .setLabel("Start Balancing");

    return [
      new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(
        join,
        leave,
        start,
        cancelButton(view.sessionId)
      ),
    ];
  }

  if (view.state === "balanced") {
    const pick = new StringSelectMenuBuilder()
      .setCustomId(customId(view.sessionId, "pick"))
      .setPlaceholder("Select player from Team A to swap")
      .addOptions(view.teamA.map(playerOption));

    const rebalance = new ButtonBuilder()
      .setCustomId(customId(view.sessionId, "rebalance"))
      .setStyle(ButtonStyle.Secondary)
      .setEmoji("🎲")
      .setLabel("Rebalance");

    const finalize = new ButtonBuilder()
      .setCustomId(customId(view.sessionId, "finalize"))
      .setStyle(ButtonStyle.Success)
      .setEmoji("✅")
      .setLabel("Finalize Teams");

    return [
      new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(pick),
      new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(
        rebalance,
        finalize,
        cancelButton(view.sessionId)
      ),
    ];
  }

  // balancing and every terminal state are not interactive
  return [];
}

/** Second step of a swap: choose the Team B player for `pickedId`. */
export function renderSwapPicker(
  view: SessionView,
  pickedId: string
): ActionRowBuilder<MessageActionRowComponentBuilder>[] {
  const select = new StringSelectMenuBuilder()
    .setCustomId(customId(view.sessionId, "swap", pickedId))
    .setPlaceholder("Select player from Team B")
    .addOptions(view.teamB.map(playerOption));
  return [new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(select)];
}

function renderOpen(view: SessionView, opts: RenderOptions): EmbedBuilder {
  const ageSeconds = opts.nowMs / 1000 - view.createdAt;
  const intro = `Click **Join Session** to participate!\nWe need exactly **${view.capacity}** players.`;
  const old = ageSeconds > opts.warnAfterSeconds;

  const embed = new EmbedBuilder()
    .setTitle("🎮 Team Balancing Session")
    .setDescription(
      old ? `⚠️ **Session is getting old** - it will expire soon!\n\n${intro}` : intro
    )
    .setColor(old ? Colors.Red : Colors.Orange)
    .addFields([
      {
        name: `Participants (${view.participantCount}/${view.capacity})`,
        value:
          view.participants.length > 0
            ? truncateLines(view.participants.map((p) => `• <@${p.externalId}>`).join("\n"), 1024)
            : "*No one has joined yet...*",
      },
    ])
    .setFooter({ text: `session ${view.sessionId}` });

  if (view.participantCount === view.capacity) {
    embed.setColor(Colors.Green);
    embed.setFooter({ text: "✅ Ready! Click 'Start Balancing' to create teams." });
  }
  return embed;
}

function renderTeams(view: SessionView): EmbedBuilder {
  const embed = new EmbedBuilder().addFields([
    {
      name: `🔵 Team A (Avg: ${view.statsA.averageRating} ELO)`,
      value: renderTeamLines(view.teamA),
      inline: true,
    },
    {
      name: `🔴 Team B (Avg: ${view.statsB.averageRating} ELO)`,
      value: renderTeamLines(view.teamB),
      inline: true,
    },
    { name: "📊 Balance", value: renderBalance(view.statsA, view.statsB, view.ratingGap) },
  ]);

  embed.setFooter({
    text: view.seed ? `session ${view.sessionId} • seed ${view.seed}` : `session ${view.sessionId}`,
  });
  return embed;
}

export function renderTeamLines(team: readonly Participant[]): string {
  if (team.length === 0) return "—";
  const lines = team.map(
    (p, i) => `${i + 1}. **${escapeMarkdown(p.displayName)}** - ${p.rating} ELO`
  );
  return truncateLines(lines.join("\n"), 1024);
}

function renderBalance(a: TeamStats, b: TeamStats, gap: number): string {
  return `ELO Difference: **${gap}** (${a.totalRating} vs ${b.totalRating})`;
}

function cancelButton(sessionId: string): ButtonBuilder {
  return new ButtonBuilder()
    .setCustomId(customId(sessionId, "cancel"))
    .setStyle(ButtonStyle.Danger)
    .setEmoji("❌")
    .setLabel("Cancel");
}

function playerOption(p: Participant): { label: string; value: string } {
  return { label: `${p.displayName} (${p.rating} ELO)`.slice(0, 100), value: p.externalId };
}

function renderMentionsOrDash(members: readonly { externalId: string }[]): string {
  if (members.length === 0) return "—";
  return truncateLines(members.map((m) => `• <@${m.externalId}>`).join("\n"), 1024);
}

function truncateLines(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return `${s.slice(0, maxLen - 10)}\n…`;
}

/** Ephemeral text for a rejected action. */
export function describeError(error: SessionError, capacity: number): string {
  switch (error.code) {
    case "PARTIAL_FAILURE":
      return `❌ Could not fetch ELO for ${error.failedParticipants
        .map((m) => `<@${m.externalId}>`)
        .join(", ")}. Start a new session once they are sorted out.`;
    case "NOT_LINKED":
      return "❌ You need to link your FACEIT account first! Use `/profile <faceit_username>`";
    case "ALREADY_JOINED":
      return "ℹ️ You're already in the session!";
    case "FULL":
      return "❌ Session is full!";
    case "NOT_MEMBER":
      return "ℹ️ You're not in the session!";
    case "WRONG_SIZE":
      return `❌ Need exactly ${capacity} players!`;
    case "ALREADY_BALANCED":
      return "ℹ️ Teams have already been created!";
    case "NOT_BALANCED":
      return "ℹ️ Teams have not been created yet.";
    case "NOT_OPEN":
      return "ℹ️ The session is no longer taking players.";
    case "PLAYER_NOT_FOUND":
      return "❌ One or both players not found in their teams.";
    case "SESSION_TERMINAL":
      return "⏰ This session has ended. Please start a new session with `/balance`, `/start`, or `/mix`.";
    case "SESSION_NOT_FOUND":
    case "SESSION_UNAVAILABLE":
      return "This session is no longer available. Please start a new one with `/balance`, `/start`, or `/mix`.";
  }
}
