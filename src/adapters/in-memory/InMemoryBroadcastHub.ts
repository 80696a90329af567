/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { BroadcastHub, Connection } from "../../domain/ports/BroadcastHub.js";
import type { Logger } from "../../domain/ports/Logger.js";
import type { ServerMessage } from "../../domain/messages.js";
import type { PlayerId, RoomId } from "../../domain/typedefs.js";

export class InMemoryBroadcastHub implements BroadcastHub {
  #rooms: Map<RoomId, Map<PlayerId, Connection>> = new Map();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  register(roomId: RoomId, playerId: PlayerId, connection: Connection): void {
    let connections = this.#rooms.get(roomId);
    if (!connections) {
      connections = new Map<PlayerId, Connection>();
      this.#rooms.set(roomId, connections);
    }
    connections.set(playerId, connection);

    this.#logger?.info("Connection registered", {
      roomId,
      playerId,
      size: connections.size,
    });
  }

  unregister(roomId: RoomId, playerId: PlayerId): void {
    const connections = this.#rooms.get(roomId);
    if (!connections) {
      return;
    }
    connections.delete(playerId);
    if (connections.size === 0) {
      this.#rooms.delete(roomId);
    }
  }

  async broadcast(roomId: RoomId, message: ServerMessage): Promise<void> {
    const connections = this.#rooms.get(roomId);
    if (!connections) {
      return;
    }

    const payload = JSON.stringify(message);
    const failed: Array<readonly [PlayerId, Connection]> = [];

    for (const [playerId, connection] of [...connections]) {
      try {
        await connection.send(payload);
      } catch (error) {
        failed.push([playerId, connection]);
        this.#logger?.warn("Failed to deliver message", {
          roomId,
          playerId,
          action: message.action,
          error,
        });
      }
    }

    for (const [playerId, connection] of failed) {
      if (connections.get(playerId) === connection) {
        this.unregister(roomId, playerId);
      }
    }

    this.#logger?.debug?.("Message broadcast", { roomId, action: message.action });
  }

  async unicast(connection: Connection, message: ServerMessage): Promise<void> {
    try {
      await connection.send(JSON.stringify(message));
    } catch (error) {
      this.#logger?.warn("Failed to deliver direct message", {
        action: message.action,
        error,
      });
    }
  }

  connection(roomId: RoomId, playerId: PlayerId): Connection | undefined {
    return this.#rooms.get(roomId)?.get(playerId);
  }

  dropRoom(roomId: RoomId): void {
    this.#rooms.delete(roomId);
  }

  connectionCount(roomId?: RoomId): number {
    if (roomId !== undefined) {
      return this.#rooms.get(roomId)?.size ?? 0;
    }

    let total = 0;
    for (const connections of this.#rooms.values()) {
      total += connections.size;
    }
    return total;
  }
}
