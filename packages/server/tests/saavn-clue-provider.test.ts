import { afterEach, describe, expect, it, vi } from "vitest";

import { SaavnClueProvider } from "../src/adapters/SaavnClueProvider.js";

const SEARCH_URL = "https://music.example.test/api/search/albums";
const ALBUM_URL = "https://music.example.test/api/albums";

function jsonResponse(body: unknown, ok = true, status = 200) {
  return { ok, status, json: async () => body };
}

function createProvider() {
  return new SaavnClueProvider({ searchUrl: SEARCH_URL, albumUrl: ALBUM_URL });
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("SaavnClueProvider", () => {
  it("searches the album and returns its songs with the preferred links", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ data: { results: [{ id: "alb-7" }] } }))
      .mockResolvedValueOnce(
        jsonResponse({
          data: {
            songs: [
              {
                name: "Rain Song",
                downloadUrl: [
                  { quality: "96kbps", url: "https://cdn.example.test/rain-96.mp3" },
                  { quality: "320kbps", url: "https://cdn.example.test/rain-320.mp3" },
                ],
                image: [
                  { quality: "50x50", url: "https://cdn.example.test/rain-50.jpg" },
                  { quality: "500x500", url: "https://cdn.example.test/rain-500.jpg" },
                ],
              },
            ],
          },
        }),
      );
    vi.stubGlobal("fetch", fetchMock);

    const candidates = await createProvider().search("Monsoon Letters");

    expect(candidates).toEqual([
      {
        title: "Rain Song",
        audioUrl: "https://cdn.example.test/rain-320.mp3",
        imageUrl: "https://cdn.example.test/rain-500.jpg",
      },
    ]);
    expect(fetchMock).toHaveBeenNthCalledWith(
      1,
      `${SEARCH_URL}?query=Monsoon+Letters&limit=1`,
      expect.objectContaining({ signal: undefined }),
    );
    expect(fetchMock).toHaveBeenNthCalledWith(
      2,
      `${ALBUM_URL}?id=alb-7`,
      expect.objectContaining({ signal: undefined }),
    );
  });

  it("falls back to the first link and skips songs without playable audio", async () => {
    vi.stubGlobal(
      "fetch",
      vi
        .fn()
        .mockResolvedValueOnce(jsonResponse({ data: { results: [{ id: 42 }] } }))
        .mockResolvedValueOnce(
          jsonResponse({
            data: {
              songs: [
                {
                  name: "Harbour Theme",
                  downloadUrl: [{ quality: "160kbps", url: "https://cdn.example.test/h.mp3" }],
                },
                {
                  name: "Broken Track",
                  downloadUrl: [{ quality: "320kbps", url: "ftp://cdn.example.test/b.mp3" }],
                },
              ],
            },
          }),
        ),
    );

    await expect(createProvider().search("Harbour Lights")).resolves.toEqual([
      { title: "Harbour Theme", audioUrl: "https://cdn.example.test/h.mp3", imageUrl: "" },
    ]);
  });

  it("returns nothing when no album matches", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ data: { results: [] } }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(createProvider().search("Nothing Here")).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("does not call out for an empty title", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    await expect(createProvider().search("<b></b>")).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("throws on an error status", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({}, false, 502)));

    await expect(createProvider().search("Golden Hour")).rejects.toThrow(
      "Clue lookup failed: 502 /api/search/albums",
    );
  });

  it("passes the abort signal through", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ data: { results: [] } }));
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();

    await createProvider().search("Golden Hour", controller.signal);

    expect(fetchMock).toHaveBeenCalledWith(expect.any(String), { signal: controller.signal });
  });
});
