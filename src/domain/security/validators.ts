import type { PlayerId, RoomId } from "../typedefs.js";

export const ROOM_ID_PATTERN = /^[A-Z0-9]{6}$/;
export const MIN_PLAYER_ID = 10_000;
export const MAX_PLAYER_ID = 99_999;

export function isValidRoomId(value: unknown): value is RoomId {
  return typeof value === "string" && ROOM_ID_PATTERN.test(value);
}

export function isValidPlayerId(value: unknown): value is PlayerId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= MIN_PLAYER_ID &&
    value <= MAX_PLAYER_ID
  );
}

export function isHttpUrl(value: unknown): value is string {
  return (
    typeof value === "string" && (value.startsWith("http://") || value.startsWith("https://"))
  );
}
