/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { RoundTask, Session } from "../entities/Session.js";
import { selectWinner } from "../entities/ScoringRules.js";
import type { Winner } from "../messages.js";
import type { BroadcastHub } from "../ports/BroadcastHub.js";
import type { Logger } from "../ports/Logger.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { ServerConfig } from "../ServerConfig.js";
import type { Clue, RoomId } from "../typedefs.js";
import { publishSnapshot } from "./publishers.js";

export interface ClueSource {
  draw(signal?: AbortSignal): Promise<Clue>;
}

interface RoundSchedulerOptions {
  readonly clues: ClueSource;
  readonly hub: BroadcastHub;
  readonly scheduler: Scheduler;
  readonly config: Pick<ServerConfig, "revealDurationMs">;
  readonly logger?: Logger;
}

/**
 * Drives each started room through its rounds: clue, guessing window, reveal, pause.
 * At most one loop runs per room; the loop holds its handle on the session while it runs.
 */
export class RoundScheduler {
  #tasks: Map<RoomId, RoundTask> = new Map();
  readonly #clues: ClueSource;
  readonly #hub: BroadcastHub;
  readonly #scheduler: Scheduler;
  readonly #config: RoundSchedulerOptions["config"];
  readonly #logger: Logger | undefined;

  constructor({ clues, hub, scheduler, config, logger }: RoundSchedulerOptions) {
    this.#clues = clues;
    this.#hub = hub;
    this.#scheduler = scheduler;
    this.#config = config;
    this.#logger = logger;
  }

  /** Starts a game for the session. Returns false when a loop is already attached. */
  start(session: Session): boolean {
    if (session.schedulerTask) {
      return false;
    }

    session.startGame(this.#scheduler.now());

    const controller = new AbortController();
    // Deferred so the handle is attached before the loop body can finish.
    const done = Promise.resolve().then(() => this.#run(session, controller));
    const task: RoundTask = { controller, done };

    session.attachTask(task);
    this.#tasks.set(session.id, task);

    this.#logger?.info("Game started", {
      roomId: session.id,
      totalRounds: session.totalRounds,
      musicDuration: session.musicDurationSeconds,
      mode: session.mode,
    });
    return true;
  }

  isRunning(roomId: RoomId): boolean {
    return this.#tasks.has(roomId);
  }

  cancel(roomId: RoomId): void {
    const task = this.#tasks.get(roomId);
    if (!task || task.controller.signal.aborted) {
      return;
    }
    task.controller.abort();
    this.#logger?.info("Round loop cancelled", { roomId });
  }

  async shutdown(): Promise<void> {
    const pending = [...this.#tasks.entries()];
    for (const [roomId] of pending) {
      this.cancel(roomId);
    }
    await Promise.all(pending.map(([, task]) => task.done));
  }

  async #run(session: Session, controller: AbortController): Promise<void> {
    const { signal } = controller;

    try {
      while (
        !signal.aborted &&
        session.isGameActive &&
        session.currentRound < session.totalRounds
      ) {
        try {
          await this.#playRound(session, signal);
        } catch (error) {
          this.#logger?.error("Round loop failed; ending game early", {
            roomId: session.id,
            round: session.currentRound,
            error,
          });
          break;
        }
      }

      await this.#finish(session);
    } catch (error) {
      this.#logger?.error("Failed to finish game", { roomId: session.id, error });
    } finally {
      session.detachTask(controller);
      if (this.#tasks.get(session.id)?.controller === controller) {
        this.#tasks.delete(session.id);
      }
    }
  }

  async #playRound(session: Session, signal: AbortSignal): Promise<void> {
    const roomId = session.id;
    const clue = await this.#clues.draw(signal);
    if (signal.aborted) {
      return;
    }

    session.startRound(clue, this.#scheduler.now());
    const round = session.currentRound;
    const totalRounds = session.totalRounds;

    this.#logger?.info("Round started", { roomId, round, totalRounds });

    await this.#hub.broadcast(roomId, {
      action: "game_notification",
      type: "round_start",
      message: `Round ${round}/${totalRounds} starting! Listen carefully...`,
    });
    await this.#hub.broadcast(roomId, {
      action: "round_start",
      round,
      total_rounds: totalRounds,
    });
    await publishSnapshot(this.#hub, session);

    await this.#scheduler.sleep(session.musicDurationSeconds * 1000, signal);
    if (signal.aborted) {
      return;
    }

    session.startReveal(this.#scheduler.now());

    await this.#hub.broadcast(roomId, {
      action: "round_end",
      correct_answer: clue.answer,
      song_title: clue.title,
      album_image: clue.imageUrl,
      scores: session.scoreRecord(),
    });
    await publishSnapshot(this.#hub, session);
    await this.#hub.broadcast(roomId, {
      action: "game_notification",
      type: "round_end",
      message: `Time's up! The correct answer was: ${clue.answer}`,
    });
    await this.#announceGuesses(session);

    this.#logger?.info("Round revealed", { roomId, round });

    await this.#scheduler.sleep(this.#config.revealDurationMs, signal);
  }

  async #announceGuesses(session: Session): Promise<void> {
    const { correct, incorrect } = session.roundOutcome();
    const showTimes = session.mode === "speed";

    if (correct.length > 0) {
      const details = correct.map(({ name, points, elapsedMs }) =>
        showTimes
          ? `${name} (+${points} pts, ${formatSeconds(elapsedMs)}s)`
          : `${name} (+${points} pts)`,
      );
      await this.#hub.broadcast(session.id, {
        action: "game_notification",
        type: "correct_guesses",
        message: `Correct: ${details.join(", ")}`,
        correct_players: correct.map(({ name }) => name),
      });
    }

    if (incorrect.length > 0) {
      await this.#hub.broadcast(session.id, {
        action: "game_notification",
        type: "wrong_guesses",
        message: `Wrong: ${incorrect.map(({ name }) => name).join(", ")}`,
      });
    }

    if (correct.length === 0 && incorrect.length === 0) {
      await this.#hub.broadcast(session.id, {
        action: "game_notification",
        type: "no_guesses",
        message: "Nobody made a guess this round!",
      });
    }
  }

  async #finish(session: Session): Promise<void> {
    const roomId = session.id;
    session.endRound(this.#scheduler.now());

    const selection = selectWinner(session.scores);
    let winner: Winner | null = null;

    if (selection) {
      winner = {
        player_id: selection.playerId,
        name: session.playerName(selection.playerId) ?? "Unknown",
        score: selection.score,
      };
      await this.#hub.broadcast(roomId, {
        action: "game_notification",
        type: "game_over",
        message: `Game Over! Winner: ${winner.name} with ${winner.score} points!`,
        winner_id: winner.player_id,
        winner_name: winner.name,
        winner_score: winner.score,
      });
    }

    await this.#hub.broadcast(roomId, {
      action: "game_over",
      leaderboard: session.scoreRecord(),
      winner,
    });

    this.#logger?.info("Game finished", {
      roomId,
      rounds: session.currentRound,
      winner: winner?.player_id,
    });
  }
}

function formatSeconds(elapsedMs: number): number {
  return Math.round(elapsedMs / 10) / 100;
}
