import type { ServerMessage } from "../messages.js";
import type { PlayerId, RoomId } from "../typedefs.js";

/** A live client connection, as seen by the core. */
export interface Connection {
  send(data: string): void | Promise<void>;
  close(code: number, reason: string): void;
}

export interface BroadcastHub {
  register(roomId: RoomId, playerId: PlayerId, connection: Connection): void;
  unregister(roomId: RoomId, playerId: PlayerId): void;

  /** Sends to every connection in the room. A failing connection is dropped; delivery continues. */
  broadcast(roomId: RoomId, message: ServerMessage): Promise<void>;

  unicast(connection: Connection, message: ServerMessage): Promise<void>;

  connection(roomId: RoomId, playerId: PlayerId): Connection | undefined;
  dropRoom(roomId: RoomId): void;
  connectionCount(roomId?: RoomId): number;
}
