import { isValidPlayerId } from "../security/validators.js";
import { publishSnapshot } from "../services/publishers.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { loadSession } from "./loadSession.js";

export class KickPlayer extends Command {
  readonly type = "KickPlayer" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly targetId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { hub, logger } = ctx;
    const session = loadSession(ctx, this.roomId);

    if (this.playerId !== session.hostId) {
      logger?.debug?.("Kick ignored; requester is not the host", {
        roomId: this.roomId,
        playerId: this.playerId,
      });
      return;
    }

    if (!isValidPlayerId(this.targetId) || this.targetId === session.hostId) {
      return;
    }

    const connection = hub.connection(this.roomId, this.targetId);
    hub.unregister(this.roomId, this.targetId);
    connection?.close(1000, "Kicked by host");
    session.removePlayer(this.targetId, this.at);

    logger?.info("Player kicked", {
      type: this.type,
      roomId: this.roomId,
      targetId: this.targetId,
    });

    await publishSnapshot(hub, session);
  }
}
