import { ValidationRejectedError } from "../errors/ValidationRejectedError.js";
import { publishSnapshot } from "../services/publishers.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { loadSession } from "./loadSession.js";

export class StartGame extends Command {
  readonly type = "StartGame" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { hub, rounds, logger } = ctx;
    const session = loadSession(ctx, this.roomId);

    if (this.playerId !== session.hostId) {
      logger?.debug?.("Start ignored; requester is not the host", {
        roomId: this.roomId,
        playerId: this.playerId,
      });
      return;
    }

    if (session.schedulerTask || !rounds.start(session)) {
      throw ValidationRejectedError.because(["Game already in progress"]);
    }

    await publishSnapshot(hub, session);
  }
}
