import type { Connection } from "../ports/BroadcastHub.js";
import { publishSnapshot } from "../services/publishers.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { loadSession } from "./loadSession.js";

export class SubmitGuess extends Command {
  readonly type = "SubmitGuess" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly text: string,
    public readonly connection: Connection,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { hub, logger } = ctx;
    const session = loadSession(ctx, this.roomId);
    const result = session.recordGuess(this.playerId, this.text, this.at);

    if (result.kind === "rejected") {
      logger?.debug?.("Guess rejected", {
        roomId: this.roomId,
        playerId: this.playerId,
        reason: result.reason,
      });
      return;
    }

    await hub.unicast(this.connection, {
      action: "guess_result",
      correct: result.kind === "correct",
      points_earned: result.kind === "correct" ? result.points : 0,
    });
    await publishSnapshot(hub, session);
  }
}
