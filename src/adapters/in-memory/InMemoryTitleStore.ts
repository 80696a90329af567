import type { TitleProvider } from "../../domain/ports/TitleProvider.js";
import { sanitizeText } from "../../domain/security/sanitizeText.js";
import type { ServerConfig } from "../../domain/ServerConfig.js";

const MAX_TITLE_LENGTH = 200;

type SuggestionLimits = Pick<
  ServerConfig,
  "minSuggestionQueryLength" | "maxSuggestionQueryLength" | "maxSuggestions"
>;

interface InMemoryTitleStoreOptions {
  readonly limits: SuggestionLimits;
  readonly random?: () => number;
}

export class InMemoryTitleStore implements TitleProvider {
  readonly #titles: readonly string[];
  readonly #limits: SuggestionLimits;
  readonly #random: () => number;

  constructor(titles: readonly string[], { limits, random = Math.random }: InMemoryTitleStoreOptions) {
    const unique = new Set<string>();
    for (const title of titles) {
      const trimmed = title.trim();
      if (trimmed.length > 0 && trimmed.length <= MAX_TITLE_LENGTH) {
        unique.add(trimmed);
      }
    }

    this.#titles = [...unique];
    this.#limits = limits;
    this.#random = random;
  }

  get size(): number {
    return this.#titles.length;
  }

  async randomTitle(): Promise<string | undefined> {
    if (this.#titles.length === 0) {
      return undefined;
    }
    const index = Math.floor(this.#random() * this.#titles.length);
    const title = this.#titles[Math.min(index, this.#titles.length - 1)];
    return title === undefined ? undefined : sanitizeText(title);
  }

  async suggest(query: string): Promise<readonly string[]> {
    const needle = sanitizeText(query).toLowerCase();
    const { minSuggestionQueryLength, maxSuggestionQueryLength, maxSuggestions } = this.#limits;
    if (needle.length < minSuggestionQueryLength || needle.length > maxSuggestionQueryLength) {
      return [];
    }

    const matches: string[] = [];
    for (const title of this.#titles) {
      if (matches.length >= maxSuggestions) {
        break;
      }
      if (title.toLowerCase().includes(needle)) {
        matches.push(sanitizeText(title));
      }
    }
    return matches;
  }
}
