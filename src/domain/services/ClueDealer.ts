import type { ClueProvider } from "../ports/ClueProvider.js";
import type { Logger } from "../ports/Logger.js";
import type { TitleProvider } from "../ports/TitleProvider.js";
import { sanitizeText } from "../security/sanitizeText.js";
import { isHttpUrl } from "../security/validators.js";
import type { ServerConfig } from "../ServerConfig.js";
import type { Clue } from "../typedefs.js";

const MISSING_IMAGE_URL = "https://via.placeholder.com/300x300?text=No+Image";

interface ClueDealerOptions {
  readonly titles: TitleProvider;
  readonly clues: ClueProvider;
  readonly config: Pick<ServerConfig, "providerTimeoutMs" | "fallbackClue">;
  readonly random?: () => number;
  readonly logger?: Logger;
}

/**
 * Picks the clue for the next round. Provider failures, timeouts and empty results all fall back
 * to the configured demo clue; {@link ClueDealer.draw} never rejects because of a collaborator.
 */
export class ClueDealer {
  readonly #titles: TitleProvider;
  readonly #clues: ClueProvider;
  readonly #config: ClueDealerOptions["config"];
  readonly #random: () => number;
  readonly #logger: Logger | undefined;

  constructor({ titles, clues, config, random = Math.random, logger }: ClueDealerOptions) {
    this.#titles = titles;
    this.#clues = clues;
    this.#config = config;
    this.#random = random;
    this.#logger = logger;
  }

  /** `signal` lets the round loop give up on a pending lookup when the room is torn down. */
  async draw(signal?: AbortSignal): Promise<Clue> {
    const fallback = this.#config.fallbackClue;

    let title: string | undefined;
    try {
      title = await this.#titles.randomTitle();
    } catch (error) {
      this.#logger?.warn("Title lookup failed; using fallback clue", { error });
      return fallback;
    }

    if (!title) {
      this.#logger?.warn("No title available; using fallback clue");
      return fallback;
    }

    try {
      const deadline = AbortSignal.timeout(this.#config.providerTimeoutMs);
      const lookupSignal = signal ? AbortSignal.any([deadline, signal]) : deadline;
      const candidates = await untilAborted(
        this.#clues.search(title, lookupSignal),
        lookupSignal,
      );
      const playable = candidates.filter((candidate) => isHttpUrl(candidate.audioUrl));
      if (playable.length === 0) {
        this.#logger?.warn("No playable clue found; using fallback clue", { title });
        return fallback;
      }

      const index = Math.min(Math.floor(this.#random() * playable.length), playable.length - 1);
      const chosen = playable[index] ?? playable[0];
      if (!chosen) {
        return fallback;
      }

      this.#logger?.info("Clue selected", { title, song: chosen.title });
      return {
        title: sanitizeText(chosen.title) || "Unknown",
        answer: sanitizeText(title),
        audioUrl: chosen.audioUrl,
        imageUrl: isHttpUrl(chosen.imageUrl) ? chosen.imageUrl : MISSING_IMAGE_URL,
      };
    } catch (error) {
      this.#logger?.warn("Clue lookup failed; using fallback clue", { title, error });
      return fallback;
    }
  }
}

/** Settles with `work`, or rejects as soon as `signal` aborts, whichever comes first. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason instanceof Error ? signal.reason : new Error("Clue lookup aborted"));
    };

    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
