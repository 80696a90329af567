import { AuthFailedError } from "./AuthFailedError.js";
import { CapacityExceededError } from "./CapacityExceededError.js";
import { RoomNotFoundError } from "./RoomNotFoundError.js";
import { ValidationRejectedError } from "./ValidationRejectedError.js";

export { AuthFailedError } from "./AuthFailedError.js";
export { CapacityExceededError } from "./CapacityExceededError.js";
export { InvalidSessionStateError } from "./InvalidSessionStateError.js";
export { RoomNotFoundError } from "./RoomNotFoundError.js";
export { ValidationRejectedError } from "./ValidationRejectedError.js";

/** Errors whose message may be shown to the player that caused them. */
export type PlayerFacingError =
  | AuthFailedError
  | CapacityExceededError
  | RoomNotFoundError
  | ValidationRejectedError;

export function isPlayerFacingError(error: unknown): error is PlayerFacingError {
  return (
    error instanceof AuthFailedError ||
    error instanceof CapacityExceededError ||
    error instanceof RoomNotFoundError ||
    error instanceof ValidationRejectedError
  );
}
