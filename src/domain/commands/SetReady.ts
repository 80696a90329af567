import { publishSnapshot } from "../services/publishers.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { loadSession } from "./loadSession.js";

export class SetReady extends Command {
  readonly type = "SetReady" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly isReady: boolean,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const session = loadSession(ctx, this.roomId);
    if (!session.setReady(this.playerId, this.isReady, this.at)) {
      return;
    }
    await publishSnapshot(ctx.hub, session);
  }
}
