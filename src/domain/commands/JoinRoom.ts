import { AuthFailedError } from "../errors/AuthFailedError.js";
import { CapacityExceededError } from "../errors/CapacityExceededError.js";
import { ValidationRejectedError } from "../errors/ValidationRejectedError.js";
import type { Connection } from "../ports/BroadcastHub.js";
import { sanitizeText } from "../security/sanitizeText.js";
import { isValidPlayerId, isValidRoomId } from "../security/validators.js";
import { publishSnapshot } from "../services/publishers.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { loadSession } from "./loadSession.js";

/**
 * Admits a connection into a room. A player already seated in the room (the host right after
 * creating it) is re-attached instead of added.
 */
export class JoinRoom extends Command {
  readonly type = "JoinRoom" as const;
  readonly playerName: string;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    playerName: string,
    public readonly password: string | undefined,
    public readonly connection: Connection,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!isValidRoomId(roomId)) {
      issues.push("Invalid room ID format");
    }
    if (!isValidPlayerId(playerId)) {
      issues.push("Invalid client ID");
    }

    this.playerName = sanitizeText(playerName);
    if (this.playerName.length === 0) {
      issues.push("Invalid player name");
    }

    if (issues.length > 0) {
      throw ValidationRejectedError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { hub, config, logger } = ctx;
    const session = loadSession(ctx, this.roomId);

    if (!session.verifyPassword(this.password)) {
      throw new AuthFailedError(this.roomId);
    }

    const rejoining = session.hasPlayer(this.playerId);
    if (!rejoining && !session.addPlayer(this.playerId, this.playerName, this.at)) {
      throw new CapacityExceededError("players", config.maxPlayersPerRoom);
    }

    const previous = hub.connection(this.roomId, this.playerId);
    hub.register(this.roomId, this.playerId, this.connection);
    if (previous && previous !== this.connection) {
      previous.close(1000, "Replaced by a new connection");
    }

    logger?.info("Player joined room", {
      type: this.type,
      roomId: this.roomId,
      playerId: this.playerId,
      rejoining,
      players: session.playerCount,
    });

    await publishSnapshot(hub, session);
  }
}
