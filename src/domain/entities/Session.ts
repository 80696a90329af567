/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { createHash, timingSafeEqual } from "node:crypto";

import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import type { ClueSnapshot, SessionSnapshot, SettingsPayload } from "../messages.js";
import { sanitizeText } from "../security/sanitizeText.js";
import type { ServerConfig } from "../ServerConfig.js";
import type {
  Clue,
  GameMode,
  GameSettings,
  Player,
  PlayerId,
  RoomId,
  SessionPhase,
  TimePoint,
} from "../typedefs.js";
import { GAME_MODES } from "../typedefs.js";
import { pointsForCorrectGuess } from "./ScoringRules.js";

export type SessionLimits = Pick<
  ServerConfig,
  | "maxPlayersPerRoom"
  | "minRounds"
  | "maxRounds"
  | "minMusicDurationSeconds"
  | "maxMusicDurationSeconds"
  | "defaultTotalRounds"
  | "defaultMusicDurationSeconds"
  | "maxTextLength"
  | "maxNameLength"
>;

/** Handle to the round loop running for a session. */
export interface RoundTask {
  readonly controller: AbortController;
  readonly done: Promise<void>;
}

export type GuessRejection = "round_inactive" | "unknown_player" | "already_guessed";

export type GuessResult =
  | { readonly kind: "correct"; readonly points: number; readonly elapsedMs: number }
  | { readonly kind: "incorrect"; readonly elapsedMs: number }
  | { readonly kind: "rejected"; readonly reason: GuessRejection };

export interface CorrectGuess {
  readonly playerId: PlayerId;
  readonly name: string;
  readonly points: number;
  readonly elapsedMs: number;
}

export interface RoundOutcome {
  readonly correct: readonly CorrectGuess[];
  readonly incorrect: readonly { readonly playerId: PlayerId; readonly name: string }[];
}

export interface SessionOptions {
  readonly id: RoomId;
  readonly hostId: PlayerId;
  readonly hostName: string;
  readonly password?: string | undefined;
  readonly limits: SessionLimits;
  readonly at: TimePoint;
}

export function hashPassword(password: string): string {
  return createHash("sha256").update(password, "utf8").digest("hex");
}

/**
 * State of one room: players, scores, settings and the current round.
 *
 * Every mutator is synchronous. Connection handlers and the round loop only interleave at
 * `await` points, so each call here is atomic with respect to the others.
 */
export class Session {
  readonly id: RoomId;
  readonly createdAt: TimePoint;
  readonly #limits: SessionLimits;
  readonly #passwordHash: string | undefined;
  readonly #players: Map<PlayerId, Player> = new Map();
  readonly #scores: Map<PlayerId, number> = new Map();
  readonly #guessed: Set<PlayerId> = new Set();
  readonly #guessTimes: Map<PlayerId, number> = new Map();
  readonly #roundPoints: Map<PlayerId, number> = new Map();
  #hostId: PlayerId;
  #phase: SessionPhase = "lobby";
  #gameActive = false;
  #currentRound = 0;
  #totalRounds: number;
  #musicDurationSeconds: number;
  #mode: GameMode = "regular";
  #clue: Clue | undefined;
  #roundStartedAt: TimePoint | undefined;
  #lastActivity: TimePoint;
  #task: RoundTask | undefined;

  constructor({ id, hostId, hostName, password, limits, at }: SessionOptions) {
    this.id = id;
    this.createdAt = at;
    this.#lastActivity = at;
    this.#limits = limits;
    this.#hostId = hostId;
    this.#totalRounds = limits.defaultTotalRounds;
    this.#musicDurationSeconds = limits.defaultMusicDurationSeconds;
    this.#passwordHash = password ? hashPassword(password) : undefined;
    this.#players.set(hostId, {
      id: hostId,
      name: sanitizeText(hostName, limits.maxNameLength),
      isReady: false,
    });
  }

  get hostId(): PlayerId {
    return this.#hostId;
  }

  get hostName(): string {
    return this.#players.get(this.#hostId)?.name ?? "Unknown";
  }

  get phase(): SessionPhase {
    return this.#phase;
  }

  get isGameActive(): boolean {
    return this.#gameActive;
  }

  get hasPassword(): boolean {
    return this.#passwordHash !== undefined;
  }

  get currentRound(): number {
    return this.#currentRound;
  }

  get totalRounds(): number {
    return this.#totalRounds;
  }

  get musicDurationSeconds(): number {
    return this.#musicDurationSeconds;
  }

  get mode(): GameMode {
    return this.#mode;
  }

  get clue(): Clue | undefined {
    return this.#clue;
  }

  get lastActivity(): TimePoint {
    return this.#lastActivity;
  }

  get playerCount(): number {
    return this.#players.size;
  }

  get players(): readonly Player[] {
    return [...this.#players.values()].map((player) => ({ ...player }));
  }

  get scores(): ReadonlyMap<PlayerId, number> {
    return new Map(this.#scores);
  }

  get schedulerTask(): RoundTask | undefined {
    return this.#task;
  }

  hasPlayer(playerId: PlayerId): boolean {
    return this.#players.has(playerId);
  }

  playerName(playerId: PlayerId): string | undefined {
    return this.#players.get(playerId)?.name;
  }

  verifyPassword(candidate?: string): boolean {
    if (this.#passwordHash === undefined) {
      return true;
    }
    if (candidate === undefined) {
      return false;
    }

    return timingSafeEqual(
      Buffer.from(this.#passwordHash, "hex"),
      Buffer.from(hashPassword(candidate), "hex"),
    );
  }

  addPlayer(playerId: PlayerId, name: string, at: TimePoint): boolean {
    if (this.#players.has(playerId)) {
      return false;
    }
    if (this.#players.size >= this.#limits.maxPlayersPerRoom) {
      return false;
    }

    this.#players.set(playerId, {
      id: playerId,
      name: sanitizeText(name, this.#limits.maxNameLength),
      isReady: false,
    });
    this.#touch(at);
    return true;
  }

  removePlayer(playerId: PlayerId, at: TimePoint): void {
    this.#players.delete(playerId);
    this.#scores.delete(playerId);
    this.#touch(at);

    if (playerId === this.#hostId) {
      const [nextHost] = this.#players.keys();
      if (nextHost !== undefined) {
        this.#hostId = nextHost;
      }
    }
  }

  setReady(playerId: PlayerId, isReady: boolean, at: TimePoint): boolean {
    const player = this.#players.get(playerId);
    if (!player) {
      return false;
    }
    player.isReady = isReady;
    this.#touch(at);
    return true;
  }

  /** Accepted before the first game and between games, never while one is running. */
  updateSettings(settings: GameSettings, at: TimePoint): boolean {
    if ((this.#phase !== "lobby" && this.#phase !== "ended") || this.#gameActive) {
      return false;
    }

    const { totalRounds, musicDurationSeconds, mode } = settings;
    const limits = this.#limits;
    if (
      !Number.isInteger(totalRounds) ||
      totalRounds < limits.minRounds ||
      totalRounds > limits.maxRounds
    ) {
      return false;
    }
    if (
      !Number.isInteger(musicDurationSeconds) ||
      musicDurationSeconds < limits.minMusicDurationSeconds ||
      musicDurationSeconds > limits.maxMusicDurationSeconds
    ) {
      return false;
    }
    if (!GAME_MODES.includes(mode)) {
      return false;
    }

    this.#totalRounds = totalRounds;
    this.#musicDurationSeconds = musicDurationSeconds;
    this.#mode = mode;
    this.#touch(at);
    return true;
  }

  /** Resets counters and scores for a new game. A finished room may start a rematch. */
  startGame(at: TimePoint): void {
    if (this.#task) {
      this.#fail("a round loop is already attached");
    }
    if (this.#phase === "round_active" || this.#phase === "reveal") {
      this.#fail("a game is already in progress");
    }

    this.#phase = "lobby";
    this.#gameActive = true;
    this.#currentRound = 0;
    this.#clue = undefined;
    this.#roundStartedAt = undefined;
    this.#scores.clear();
    for (const playerId of this.#players.keys()) {
      this.#scores.set(playerId, 0);
    }
    this.#clearRoundTracking();
    this.#touch(at);
  }

  attachTask(task: RoundTask): void {
    if (this.#task) {
      this.#fail("a round loop is already attached");
    }
    this.#task = task;
  }

  detachTask(controller: AbortController): void {
    if (this.#task?.controller === controller) {
      this.#task = undefined;
    }
  }

  startRound(clue: Clue, at: TimePoint): void {
    if (!this.#gameActive) {
      this.#fail("cannot start a round without an active game");
    }
    if (this.#phase !== "lobby" && this.#phase !== "reveal") {
      this.#fail(`cannot start a round from ${this.#phase}`);
    }
    if (this.#currentRound >= this.#totalRounds) {
      this.#fail("all rounds have been played");
    }

    this.#currentRound += 1;
    this.#phase = "round_active";
    this.#clue = clue;
    this.#roundStartedAt = at;
    this.#clearRoundTracking();
    this.#touch(at);
  }

  startReveal(at: TimePoint): void {
    if (this.#phase !== "round_active") {
      this.#fail(`cannot reveal from ${this.#phase}`);
    }
    this.#phase = "reveal";
    this.#touch(at);
  }

  /** Closes the current round for good and marks the game inactive. */
  endRound(at: TimePoint): void {
    this.#phase = "ended";
    this.#gameActive = false;
    this.#touch(at);
  }

  recordGuess(playerId: PlayerId, text: string, at: TimePoint): GuessResult {
    if (this.#phase !== "round_active") {
      return { kind: "rejected", reason: "round_inactive" };
    }
    if (!this.#players.has(playerId)) {
      return { kind: "rejected", reason: "unknown_player" };
    }
    if (this.#guessed.has(playerId)) {
      return { kind: "rejected", reason: "already_guessed" };
    }

    const guess = sanitizeText(text, this.#limits.maxTextLength);
    const elapsedMs = Math.max(0, at - (this.#roundStartedAt ?? at));

    this.#guessed.add(playerId);
    this.#guessTimes.set(playerId, elapsedMs);
    if (!this.#scores.has(playerId)) {
      this.#scores.set(playerId, 0);
    }
    this.#touch(at);

    const answer = this.#clue?.answer.toLowerCase() ?? "";
    if (answer.length === 0 || guess.toLowerCase() !== answer) {
      return { kind: "incorrect", elapsedMs };
    }

    const points = pointsForCorrectGuess(this.#mode, elapsedMs);
    this.#scores.set(playerId, (this.#scores.get(playerId) ?? 0) + points);
    this.#roundPoints.set(playerId, points);
    return { kind: "correct", points, elapsedMs };
  }

  /** Guessers of the current round who are still in the room, in guess order. */
  roundOutcome(): RoundOutcome {
    const correct: CorrectGuess[] = [];
    const incorrect: { playerId: PlayerId; name: string }[] = [];

    for (const playerId of this.#guessed) {
      const player = this.#players.get(playerId);
      if (!player) {
        continue;
      }

      const points = this.#roundPoints.get(playerId);
      if (points === undefined) {
        incorrect.push({ playerId, name: player.name });
        continue;
      }

      correct.push({
        playerId,
        name: player.name,
        points,
        elapsedMs: this.#guessTimes.get(playerId) ?? 0,
      });
    }

    return { correct, incorrect };
  }

  settingsPayload(): SettingsPayload {
    return {
      total_rounds: this.#totalRounds,
      music_duration: this.#musicDurationSeconds,
      game_type: this.#mode,
    };
  }

  scoreRecord(): Record<string, number> {
    return Object.fromEntries(
      [...this.#scores].map(([playerId, score]) => [String(playerId), score] as const),
    );
  }

  snapshot(): SessionSnapshot {
    return {
      room_id: this.id,
      host_id: this.#hostId,
      players: [...this.#players.values()].map((player) => ({
        id: player.id,
        name: player.name,
        is_ready: player.isReady,
      })),
      phase: this.#phase,
      is_game_active: this.#gameActive,
      is_round_active: this.#phase === "round_active",
      is_reveal_phase: this.#phase === "reveal",
      current_round: this.#currentRound,
      total_rounds: this.#totalRounds,
      music_duration: this.#musicDurationSeconds,
      game_type: this.#mode,
      current_song: this.#clueSnapshot(),
      scores: this.scoreRecord(),
      has_password: this.hasPassword,
    };
  }

  #clueSnapshot(): ClueSnapshot | null {
    const clue = this.#clue;
    if (!clue) {
      return null;
    }

    if (this.#phase === "round_active") {
      return { preview_url: clue.audioUrl };
    }

    if (this.#phase === "reveal") {
      return {
        preview_url: clue.audioUrl,
        title: clue.title,
        movie: clue.answer,
        image: clue.imageUrl,
      };
    }

    return null;
  }

  #clearRoundTracking(): void {
    this.#guessed.clear();
    this.#guessTimes.clear();
    this.#roundPoints.clear();
  }

  #touch(at: TimePoint): void {
    this.#lastActivity = Math.max(this.#lastActivity, at);
  }

  #fail(reason: string): never {
    throw new InvalidSessionStateError(reason, this.id, this.#phase);
  }
}
