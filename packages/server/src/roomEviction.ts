import type { BroadcastHub, Logger, Session } from "./core.js";

export const INACTIVE_ROOM_CLOSE_CODE = 1001;
export const INACTIVE_ROOM_REASON = "Room closed due to inactivity";

/** Disconnects everyone still attached to an evicted room and forgets its connections. */
export function createRoomEvictionHandler(
  hub: BroadcastHub,
  logger?: Logger,
): (session: Session) => void {
  return (session) => {
    let closed = 0;
    for (const { id } of session.players) {
      const connection = hub.connection(session.id, id);
      if (connection) {
        connection.close(INACTIVE_ROOM_CLOSE_CODE, INACTIVE_ROOM_REASON);
        closed += 1;
      }
    }
    hub.dropRoom(session.id);
    logger?.info("Evicted room disconnected", { roomId: session.id, closed });
  };
}
