import { afterEach, describe, expect, it, vi } from "vitest";

import { loadEnvironment } from "../src/config.js";
import { createConsoleLogger } from "../src/logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with the namespace", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const logger = createConsoleLogger("rooms");
    logger.info("Room created", { roomId: "ABC123" });
    logger.warn("Slow lookup");

    expect(info).toHaveBeenCalledWith("[rooms]", "Room created", { roomId: "ABC123" });
    expect(warn).toHaveBeenCalledWith("[rooms]", "Slow lookup", "");
  });

  it("drops debug lines unless debug is enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    const quiet = createConsoleLogger("rooms");
    quiet.debug?.("hidden");

    expect(quiet.debug).toBeUndefined();
    expect(debug).not.toHaveBeenCalled();
  });

  it("emits debug lines when the environment sets DEBUG", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const env = loadEnvironment({ DEBUG: "1" });

    const logger = createConsoleLogger("rooms", { debug: env.debug });
    logger.debug?.("Guess recorded", { playerId: 10001 });

    expect(debug).toHaveBeenCalledWith("[rooms]", "Guess recorded", { playerId: 10001 });
  });
});
