import type { Session } from "../entities/Session.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import type { RoomId } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

export function loadSession({ registry }: Pick<CommandContext, "registry">, roomId: RoomId): Session {
  const session = registry.lookup(roomId);
  if (!session) {
    throw new RoomNotFoundError(roomId);
  }
  return session;
}
