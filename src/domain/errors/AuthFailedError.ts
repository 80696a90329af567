import type { RoomId } from "../typedefs.js";

export class AuthFailedError extends Error {
  constructor(public readonly roomId: RoomId) {
    super("Invalid password for this room");
    this.name = "AuthFailedError";
  }
}
