import { sanitizeText } from "../security/sanitizeText.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { loadSession } from "./loadSession.js";

export class SendChat extends Command {
  readonly type = "SendChat" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly text: string,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const session = loadSession(ctx, this.roomId);
    const playerName = session.playerName(this.playerId);
    const text = sanitizeText(this.text, ctx.config.maxTextLength);

    if (playerName === undefined || text.length === 0) {
      return;
    }

    await ctx.hub.broadcast(this.roomId, {
      action: "chat_message",
      player_name: playerName,
      text,
    });
  }
}
