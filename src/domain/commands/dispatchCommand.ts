import { isPlayerFacingError } from "../errors/index.js";
import type { Command, CommandContext } from "./Command.js";

export async function dispatchCommand(
  command: Command,
  ctx: CommandContext,
): Promise<void> {
  const started = Date.now();

  try {
    ctx.logger?.debug?.(`[CMD] ${command.type}`, { command });
    await command.execute(ctx);
    ctx.logger?.debug?.(`[CMD OK] ${command.type}`, {
      ms: Date.now() - started,
    });
  } catch (error) {
    if (isPlayerFacingError(error)) {
      ctx.logger?.warn(`[CMD REJECTED] ${command.type}`, { reason: error.message });
    } else {
      ctx.logger?.error(`[CMD ERR] ${command.type}`, { error });
    }
    throw error;
  }
}
