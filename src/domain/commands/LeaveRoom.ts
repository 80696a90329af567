import type { Connection } from "../ports/BroadcastHub.js";
import { publishSnapshot } from "../services/publishers.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class LeaveRoom extends Command {
  readonly type = "LeaveRoom" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly connection: Connection,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ registry, hub, rounds, logger }: CommandContext): Promise<void> {
    const registered = hub.connection(this.roomId, this.playerId);
    if (registered && registered !== this.connection) {
      logger?.debug?.("Stale connection closed; player still attached", {
        type: this.type,
        roomId: this.roomId,
        playerId: this.playerId,
      });
      return;
    }

    hub.unregister(this.roomId, this.playerId);

    const session = registry.lookup(this.roomId);
    if (!session) {
      return;
    }

    session.removePlayer(this.playerId, this.at);

    logger?.info("Player left room", {
      type: this.type,
      roomId: this.roomId,
      playerId: this.playerId,
      players: session.playerCount,
    });

    if (session.playerCount > 0) {
      await publishSnapshot(hub, session);
      return;
    }

    rounds.cancel(this.roomId);
    registry.remove(this.roomId);
    hub.dropRoom(this.roomId);
    logger?.info("Room is empty, closing", { roomId: this.roomId });
  }
}
