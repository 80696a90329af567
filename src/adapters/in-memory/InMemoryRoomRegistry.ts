/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { customAlphabet } from "nanoid";

import { Session } from "../../domain/entities/Session.js";
import { CapacityExceededError } from "../../domain/errors/index.js";
import type { Logger } from "../../domain/ports/Logger.js";
import type { RoomRegistry, RoomSummary } from "../../domain/ports/RoomRegistry.js";
import { isValidRoomId } from "../../domain/security/validators.js";
import type { ServerConfig } from "../../domain/ServerConfig.js";
import type { PlayerId, RoomId, TimePoint } from "../../domain/typedefs.js";

const ROOM_ID_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const ROOM_ID_LENGTH = 6;

interface InMemoryRoomRegistryOptions {
  readonly config: ServerConfig;
  readonly now?: () => TimePoint;
  readonly generateId?: () => RoomId;
  /** Called for every room the sweep removes, whichever call triggered it. */
  readonly onEvict?: (session: Session) => void;
  readonly logger?: Logger;
}

export class InMemoryRoomRegistry implements RoomRegistry {
  #rooms: Map<RoomId, Session> = new Map();
  #lastSweep: TimePoint;
  readonly #config: ServerConfig;
  readonly #now: () => TimePoint;
  readonly #generateId: () => RoomId;
  readonly #onEvict: ((session: Session) => void) | undefined;
  readonly #logger: Logger | undefined;

  constructor({
    config,
    now = Date.now,
    generateId,
    onEvict,
    logger,
  }: InMemoryRoomRegistryOptions) {
    this.#config = config;
    this.#now = now;
    this.#generateId = generateId ?? customAlphabet(ROOM_ID_ALPHABET, ROOM_ID_LENGTH);
    this.#onEvict = onEvict;
    this.#logger = logger;
    this.#lastSweep = now();
  }

  get size(): number {
    return this.#rooms.size;
  }

  create(hostId: PlayerId, hostName: string, password?: string): Session {
    this.sweep();

    if (this.#rooms.size >= this.#config.maxRooms) {
      throw new CapacityExceededError("rooms", this.#config.maxRooms);
    }

    const id = this.#nextRoomId();
    const session = new Session({
      id,
      hostId,
      hostName,
      password,
      limits: this.#config,
      at: this.#now(),
    });
    this.#rooms.set(id, session);

    this.#logger?.info("Room created", {
      roomId: id,
      hostId,
      private: session.hasPassword,
      rooms: this.#rooms.size,
    });
    return session;
  }

  lookup(roomId: RoomId): Session | undefined {
    if (!isValidRoomId(roomId)) {
      return undefined;
    }
    return this.#rooms.get(roomId);
  }

  listPublic(): readonly RoomSummary[] {
    this.sweep();

    const summaries: RoomSummary[] = [];
    for (const session of this.#rooms.values()) {
      if (summaries.length >= this.#config.maxPublicRooms) {
        break;
      }
      if (session.hasPassword || session.isGameActive) {
        continue;
      }
      summaries.push({
        room_id: session.id,
        host_name: session.hostName,
        player_count: session.playerCount,
        has_password: session.hasPassword,
      });
    }
    return summaries;
  }

  sweep(): readonly RoomId[] {
    const now = this.#now();
    if (now - this.#lastSweep < this.#config.cleanupIntervalMs) {
      return [];
    }
    this.#lastSweep = now;

    const cutoff = now - this.#config.inactiveTimeoutMs;
    const evicted: Session[] = [];
    for (const session of this.#rooms.values()) {
      if (session.lastActivity < cutoff && !session.isGameActive) {
        evicted.push(session);
      }
    }

    for (const session of evicted) {
      this.#rooms.delete(session.id);
    }
    for (const session of evicted) {
      try {
        this.#onEvict?.(session);
      } catch (error) {
        this.#logger?.error("Eviction listener failed", { roomId: session.id, error });
      }
    }

    if (evicted.length > 0) {
      this.#logger?.info("Inactive rooms evicted", {
        evicted: evicted.map(({ id }) => id),
        remaining: this.#rooms.size,
      });
    }
    return evicted.map(({ id }) => id);
  }

  remove(roomId: RoomId): boolean {
    const removed = this.#rooms.delete(roomId);
    if (removed) {
      this.#logger?.info("Room removed", { roomId, rooms: this.#rooms.size });
    }
    return removed;
  }

  sessions(): Iterable<Session> {
    return this.#rooms.values();
  }

  #nextRoomId(): RoomId {
    let id = this.#generateId();
    while (this.#rooms.has(id) || !isValidRoomId(id)) {
      id = this.#generateId();
    }
    return id;
  }
}
