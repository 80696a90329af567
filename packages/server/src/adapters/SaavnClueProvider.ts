import { z } from "zod";

import type { ClueCandidate, ClueProvider, Logger } from "../core.js";
import { isHttpUrl, sanitizeText } from "../core.js";

interface SaavnClueProviderOptions {
  readonly searchUrl: string;
  readonly albumUrl: string;
  readonly logger?: Logger;
}

const linkSchema = z.object({
  quality: z.string().optional(),
  url: z.string().optional(),
});

const albumSearchSchema = z.object({
  data: z
    .object({
      results: z.array(z.object({ id: z.union([z.string(), z.number()]).optional() })),
    })
    .optional(),
});

const albumSchema = z.object({
  data: z
    .object({
      songs: z.array(
        z.object({
          name: z.string().optional(),
          downloadUrl: z.array(linkSchema).optional(),
          image: z.array(linkSchema).optional(),
        }),
      ),
    })
    .optional(),
});

type Link = z.infer<typeof linkSchema>;

const PREFERRED_AUDIO_QUALITY = "320kbps";
const PREFERRED_IMAGE_QUALITY = "500x500";

/**
 * Looks a film up as an album on a JioSaavn-compatible API and returns its songs.
 * Two requests: album search (first hit only), then the album's song list.
 */
export class SaavnClueProvider implements ClueProvider {
  readonly #searchUrl: string;
  readonly #albumUrl: string;
  readonly #logger: Logger | undefined;

  constructor({ searchUrl, albumUrl, logger }: SaavnClueProviderOptions) {
    this.#searchUrl = searchUrl;
    this.#albumUrl = albumUrl;
    this.#logger = logger;
  }

  async search(title: string, signal?: AbortSignal): Promise<readonly ClueCandidate[]> {
    const term = sanitizeText(title);
    if (!term) {
      return [];
    }

    const search = albumSearchSchema.parse(
      await this.#getJson(this.#searchUrl, { query: term, limit: "1" }, signal),
    );
    const albumId = search.data?.results[0]?.id;
    if (albumId === undefined || albumId === "") {
      this.#logger?.debug?.("No album found", { title: term });
      return [];
    }

    const album = albumSchema.parse(
      await this.#getJson(this.#albumUrl, { id: String(albumId) }, signal),
    );
    const songs = album.data?.songs ?? [];

    const candidates: ClueCandidate[] = [];
    for (const song of songs) {
      const audioUrl = pickLink(song.downloadUrl, PREFERRED_AUDIO_QUALITY);
      if (!audioUrl) {
        continue;
      }
      candidates.push({
        title: song.name ?? "Unknown",
        audioUrl,
        imageUrl: pickLink(song.image, PREFERRED_IMAGE_QUALITY) ?? "",
      });
    }

    this.#logger?.debug?.("Album songs fetched", {
      title: term,
      songs: songs.length,
      playable: candidates.length,
    });
    return candidates;
  }

  async #getJson(
    base: string,
    params: Readonly<Record<string, string>>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const url = new URL(base);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const response = await fetch(url.toString(), { signal });
    if (!response.ok) {
      throw new Error(`Clue lookup failed: ${response.status} ${url.pathname}`);
    }
    return response.json();
  }
}

function pickLink(links: readonly Link[] | undefined, preferred: string): string | undefined {
  if (!links || links.length === 0) {
    return undefined;
  }

  const best = links.find((link) => link.quality === preferred)?.url;
  if (isHttpUrl(best)) {
    return best;
  }

  const first = links[0]?.url;
  return isHttpUrl(first) ? first : undefined;
}
