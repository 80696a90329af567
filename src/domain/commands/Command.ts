import type { BroadcastHub } from "../ports/BroadcastHub.js";
import type { Logger } from "../ports/Logger.js";
import type { RoomRegistry } from "../ports/RoomRegistry.js";
import type { TitleProvider } from "../ports/TitleProvider.js";
import type { ServerConfig } from "../ServerConfig.js";
import type { RoundScheduler } from "../services/RoundScheduler.js";
import type { TimePoint } from "../typedefs.js";

export type RoundRunner = Pick<RoundScheduler, "start" | "cancel" | "isRunning">;

export interface CommandContext {
  readonly registry: RoomRegistry;
  readonly hub: BroadcastHub;
  readonly rounds: RoundRunner;
  readonly titles: TitleProvider;
  readonly config: ServerConfig;
  readonly logger?: Logger;
}

export abstract class Command {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<void>;
}
