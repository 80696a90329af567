import type { RoomId, SessionPhase } from "../typedefs.js";

export class InvalidSessionStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly roomId: RoomId,
    public readonly phase: SessionPhase,
  ) {
    super(`Invalid session state: ${reason}`);
    this.name = "InvalidSessionStateError";
  }
}
