import { ValidationRejectedError } from "../errors/ValidationRejectedError.js";
import { createSettingsSchema } from "../security/clientMessages.js";
import { publishSnapshot } from "../services/publishers.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { loadSession } from "./loadSession.js";

export class UpdateSettings extends Command {
  readonly type = "UpdateSettings" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly settings: unknown,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { hub, config, logger } = ctx;
    const session = loadSession(ctx, this.roomId);

    if (this.playerId !== session.hostId) {
      logger?.debug?.("Settings update ignored; requester is not the host", {
        roomId: this.roomId,
        playerId: this.playerId,
      });
      return;
    }

    const parsed = createSettingsSchema(config).safeParse(this.settings ?? {});
    if (!parsed.success) {
      throw ValidationRejectedError.because(["Invalid settings format"]);
    }

    const updated = session.updateSettings(
      {
        totalRounds: parsed.data.total_rounds,
        musicDurationSeconds: parsed.data.music_duration,
        mode: parsed.data.game_type,
      },
      this.at,
    );
    if (!updated) {
      throw ValidationRejectedError.because(["Cannot change settings during game"]);
    }

    logger?.info("Settings updated", {
      type: this.type,
      roomId: this.roomId,
      settings: session.settingsPayload(),
    });

    await hub.broadcast(this.roomId, {
      action: "settings_updated",
      settings: session.settingsPayload(),
    });
    await publishSnapshot(hub, session);
  }
}
