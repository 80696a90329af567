import { describe, expect, it, vi } from "vitest";

import type { ClueCandidate, ClueProvider } from "../src/domain/ports/ClueProvider.js";
import type { TitleProvider } from "../src/domain/ports/TitleProvider.js";
import { DEMO_CLUE, createServerConfig } from "../src/domain/ServerConfig.js";
import { ClueDealer } from "../src/domain/services/ClueDealer.js";
import { createLoggerMock } from "./support/mocks.js";

function titlesReturning(title: string | undefined): TitleProvider {
  return {
    randomTitle: vi.fn<TitleProvider["randomTitle"]>().mockResolvedValue(title),
    suggest: vi.fn<TitleProvider["suggest"]>().mockResolvedValue([]),
  };
}

function cluesReturning(candidates: readonly ClueCandidate[]): ClueProvider {
  return { search: vi.fn<ClueProvider["search"]>().mockResolvedValue(candidates) };
}

const CANDIDATE: ClueCandidate = {
  title: "Rain Song",
  audioUrl: "https://cdn.example.com/rain.mp3",
  imageUrl: "https://cdn.example.com/rain.jpg",
};

describe("ClueDealer", () => {
  it("builds a clue from a random title and a playable candidate", async () => {
    const clues = cluesReturning([CANDIDATE]);
    const dealer = new ClueDealer({
      titles: titlesReturning("Monsoon Letters"),
      clues,
      config: createServerConfig(),
    });

    await expect(dealer.draw()).resolves.toEqual({
      title: "Rain Song",
      answer: "Monsoon Letters",
      audioUrl: "https://cdn.example.com/rain.mp3",
      imageUrl: "https://cdn.example.com/rain.jpg",
    });
    expect(clues.search).toHaveBeenCalledWith("Monsoon Letters", expect.any(AbortSignal));
  });

  it("skips candidates without an http audio url", async () => {
    const dealer = new ClueDealer({
      titles: titlesReturning("Monsoon Letters"),
      clues: cluesReturning([
        { ...CANDIDATE, title: "Broken", audioUrl: "ftp://cdn.example.com/x.mp3" },
        { ...CANDIDATE, title: "Playable" },
      ]),
      config: createServerConfig(),
      random: () => 0,
    });

    const clue = await dealer.draw();

    expect(clue.title).toBe("Playable");
  });

  it("substitutes a placeholder image and sanitizes the song title", async () => {
    const dealer = new ClueDealer({
      titles: titlesReturning("Monsoon Letters"),
      clues: cluesReturning([{ title: "<i></i>", audioUrl: CANDIDATE.audioUrl, imageUrl: "" }]),
      config: createServerConfig(),
    });

    const clue = await dealer.draw();

    expect(clue.title).toBe("Unknown");
    expect(clue.imageUrl).toBe("https://via.placeholder.com/300x300?text=No+Image");
  });

  it("falls back to the demo clue when no title is available", async () => {
    const clues = cluesReturning([CANDIDATE]);
    const dealer = new ClueDealer({
      titles: titlesReturning(undefined),
      clues,
      config: createServerConfig(),
    });

    await expect(dealer.draw()).resolves.toEqual(DEMO_CLUE);
    expect(clues.search).not.toHaveBeenCalled();
  });

  it("falls back to the demo clue when the provider finds nothing", async () => {
    const dealer = new ClueDealer({
      titles: titlesReturning("Monsoon Letters"),
      clues: cluesReturning([]),
      config: createServerConfig(),
    });

    await expect(dealer.draw()).resolves.toEqual(DEMO_CLUE);
  });

  it("falls back to the demo clue and logs when the provider fails", async () => {
    const logger = createLoggerMock();
    const dealer = new ClueDealer({
      titles: titlesReturning("Monsoon Letters"),
      clues: { search: vi.fn<ClueProvider["search"]>().mockRejectedValue(new Error("HTTP 502")) },
      config: createServerConfig(),
      logger,
    });

    await expect(dealer.draw()).resolves.toEqual(DEMO_CLUE);
    expect(logger.warn).toHaveBeenCalledWith(
      "Clue lookup failed; using fallback clue",
      expect.objectContaining({ title: "Monsoon Letters" }),
    );
  });

  it("gives up on a provider that does not answer in time", async () => {
    const dealer = new ClueDealer({
      titles: titlesReturning("Monsoon Letters"),
      clues: { search: () => new Promise<readonly ClueCandidate[]>(() => undefined) },
      config: createServerConfig({ providerTimeoutMs: 20 }),
    });

    await expect(dealer.draw()).resolves.toEqual(DEMO_CLUE);
  });

  it("gives up when the caller aborts", async () => {
    const controller = new AbortController();
    const dealer = new ClueDealer({
      titles: titlesReturning("Monsoon Letters"),
      clues: {
        search: () => {
          controller.abort();
          return new Promise<readonly ClueCandidate[]>(() => undefined);
        },
      },
      config: createServerConfig(),
    });

    await expect(dealer.draw(controller.signal)).resolves.toEqual(DEMO_CLUE);
  });
});
