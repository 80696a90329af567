/**
 * Core domain typedefs used throughout the server.
 * Identifiers stay plain aliases; their formats are enforced at the
 * perimeter by the security helpers.
 */

/** Six character uppercase alphanumeric room code */
export type RoomId = string;

/** Numeric player identifier in the 10000–99999 range */
export type PlayerId = number;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Session phase enumeration */
export type SessionPhase = "lobby" | "round_active" | "reveal" | "ended";

/** Scoring variant of a game */
export type GameMode = "regular" | "speed";

export const GAME_MODES = ["regular", "speed"] as const satisfies readonly GameMode[];

/** A single round's media and answer */
export interface Clue {
  /** Song title, shown at reveal */
  readonly title: string;
  /** Film title players have to guess */
  readonly answer: string;
  /** Audio preview played during the round */
  readonly audioUrl: string;
  /** Album art shown at reveal */
  readonly imageUrl: string;
}

export interface Player {
  readonly id: PlayerId;
  readonly name: string;
  isReady: boolean;
}

export interface GameSettings {
  readonly totalRounds: number;
  readonly musicDurationSeconds: number;
  readonly mode: GameMode;
}
