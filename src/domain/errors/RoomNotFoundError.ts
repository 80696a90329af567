import type { RoomId } from "../typedefs.js";

export class RoomNotFoundError extends Error {
  constructor(public readonly roomId: RoomId) {
    super("Room not found");
    this.name = "RoomNotFoundError";
  }
}
