import type { Session } from "../entities/Session.js";
import type { PlayerId, RoomId } from "../typedefs.js";

export interface RoomSummary {
  readonly room_id: RoomId;
  readonly host_name: string;
  readonly player_count: number;
  readonly has_password: boolean;
}

/**
 * Process-wide collection of live rooms.
 * Implementations enforce the room cap and evict idle rooms on sweep.
 */
export interface RoomRegistry {
  readonly size: number;

  /** Sweeps, then creates a room hosted by the given player. Throws when the cap is reached. */
  create(hostId: PlayerId, hostName: string, password?: string): Session;

  /** Returns undefined for malformed ids without touching storage. */
  lookup(roomId: RoomId): Session | undefined;

  listPublic(): readonly RoomSummary[];

  /**
   * Removes idle rooms, at most once per configured interval. Returns the evicted ids.
   * `create` and `listPublic` sweep as well; their evictions are not returned here.
   */
  sweep(): readonly RoomId[];

  remove(roomId: RoomId): boolean;

  sessions(): Iterable<Session>;
}
