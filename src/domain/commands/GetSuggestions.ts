import type { Connection } from "../ports/BroadcastHub.js";
import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class GetSuggestions extends Command {
  readonly type = "GetSuggestions" as const;

  constructor(
    public readonly query: string,
    public readonly connection: Connection,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ hub, titles, config, logger }: CommandContext): Promise<void> {
    let suggestions: readonly string[] = [];
    try {
      suggestions = (await titles.suggest(this.query)).slice(0, config.maxSuggestions);
    } catch (error) {
      logger?.warn("Title suggestions unavailable", { error });
    }

    await hub.unicast(this.connection, { action: "suggestions", suggestions });
  }
}
