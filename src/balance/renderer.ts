import { Client, DiscordAPIError, Message, RESTJSONErrorCodes } from "discord.js";
import { SessionRenderer, StaleSurfaceError } from "./ports";
import { renderComponents, renderEmbed, renderTerminalEmbed } from "./render";
import { SessionLocation, SessionView, TerminalReason } from "./types";

const GONE_CODES: ReadonlySet<number | string> = new Set([
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownGuild,
]);

export type DiscordRendererOptions = {
  warnAfterSeconds: number;
  now?: () => number;
};

/** Edits the session message in place; the message is the session's only surface. */
export class DiscordSessionRenderer implements SessionRenderer {
  private readonly now: () => number;

  constructor(
    private readonly client: Client,
    private readonly opts: DiscordRendererOptions
  ) {
    this.now = opts.now ?? (() => Date.now());
  }

  async renderSession(location: SessionLocation, view: SessionView): Promise<void> {
    const msg = await this.fetchMessage(location);
    await this.edit(location, () =>
      msg.edit({
        content: "",
        embeds: [
          renderEmbed(view, { nowMs: this.now(), warnAfterSeconds: this.opts.warnAfterSeconds }),
        ],
        components: renderComponents(view),
      })
    );
  }

  async renderTerminal(location: SessionLocation, reason: TerminalReason): Promise<void> {
    const msg = await this.fetchMessage(location);
    await this.edit(location, () =>
      msg.edit({ content: "", embeds: [renderTerminalEmbed(reason)], components: [] })
    );
  }

  async resolveLocation(location: SessionLocation): Promise<boolean> {
    try {
      await this.fetchMessage(location);
      return true;
    } catch (e) {
      if (e instanceof StaleSurfaceError) return false;
      throw e;
    }
  }

  private async fetchMessage(location: SessionLocation): Promise<Message> {
    try {
      const channel = await this.client.channels.fetch(location.channelId);
      if (!channel || !channel.isTextBased()) throw new StaleSurfaceError(location);
      return await channel.messages.fetch(location.messageId);
    } catch (e) {
      throw isGone(e) ? new StaleSurfaceError(location) : e;
    }
  }

  private async edit(location: SessionLocation, fn: () => Promise<Message>): Promise<void> {
    try {
      await fn();
    } catch (e) {
      throw isGone(e) ? new StaleSurfaceError(location) : e;
    }
  }
}

function isGone(e: unknown): boolean {
  if (e instanceof StaleSurfaceError) return true;
  return e instanceof DiscordAPIError && GONE_CODES.has(e.code);
}
