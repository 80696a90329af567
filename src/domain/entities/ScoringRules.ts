import type { GameMode, PlayerId } from "../typedefs.js";

export const REGULAR_POINTS = 10;
export const SPEED_MAX_POINTS = 20;
export const SPEED_MIN_POINTS = 5;
/** Points lost per elapsed second in speed mode */
export const SPEED_DECAY_PER_SECOND = 2;

export function pointsForCorrectGuess(mode: GameMode, elapsedMs: number): number {
  if (mode === "regular") {
    return REGULAR_POINTS;
  }

  const elapsedSeconds = Math.max(0, elapsedMs) / 1000;
  return Math.max(
    SPEED_MIN_POINTS,
    SPEED_MAX_POINTS - Math.floor(elapsedSeconds * SPEED_DECAY_PER_SECOND),
  );
}

export interface WinnerSelection {
  readonly playerId: PlayerId;
  readonly score: number;
}

/** Highest score wins; equal top scores go to the lowest player id. */
export function selectWinner(
  scores: ReadonlyMap<PlayerId, number>,
): WinnerSelection | undefined {
  let winner: WinnerSelection | undefined;

  for (const [playerId, score] of scores) {
    if (
      !winner ||
      score > winner.score ||
      (score === winner.score && playerId < winner.playerId)
    ) {
      winner = { playerId, score };
    }
  }

  return winner;
}
