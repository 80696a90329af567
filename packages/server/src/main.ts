import { serve } from "@hono/node-server";
import { getConnInfo } from "@hono/node-server/conninfo";
import { createNodeWebSocket } from "@hono/node-ws";
import { readFile } from "node:fs/promises";
import type { AddressInfo } from "node:net";
import { z } from "zod";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { SaavnClueProvider } from "./adapters/SaavnClueProvider.js";
import { WebSocketConnection } from "./adapters/WebSocketConnection.js";
import { createBackendApp } from "./app.js";
import { loadEnvironment } from "./config.js";
import {
  ClueDealer,
  ConnectionLimiter,
  InMemoryBroadcastHub,
  InMemoryRoomRegistry,
  InMemoryTitleStore,
  RoundScheduler,
  dispatchCommand,
} from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { RoomChannel } from "./roomChannel.js";
import { createRoomEvictionHandler } from "./roomEviction.js";

const titlesSchema = z.array(z.string());

export async function startServer(): Promise<void> {
  const env = loadEnvironment();
  const logger = createConsoleLogger("trivia-room", { debug: env.debug });
  const { config } = env;

  const titles = new InMemoryTitleStore(
    titlesSchema.parse(JSON.parse(await readFile(env.titlesPath, "utf8"))),
    { limits: config },
  );
  logger.info("Titles loaded", { path: env.titlesPath, count: titles.size });

  const scheduler = new RealScheduler({ logger });
  const hub = new InMemoryBroadcastHub(logger);
  const registry = new InMemoryRoomRegistry({
    config,
    onEvict: createRoomEvictionHandler(hub, logger),
    logger,
  });
  const limiter = new ConnectionLimiter(config.maxConnectionsPerAddress);
  const clues = new ClueDealer({
    titles,
    clues: new SaavnClueProvider({
      searchUrl: env.clueSearchUrl,
      albumUrl: env.clueAlbumUrl,
      logger,
    }),
    config,
    logger,
  });
  const rounds = new RoundScheduler({ clues, hub, scheduler, config, logger });

  const createContext = (): CommandContext => ({
    registry,
    hub,
    rounds,
    titles,
    config,
    logger,
  });

  const app = createBackendApp({ registry, hub, config, logger });
  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws/:roomId/:playerId/:playerName",
    upgradeWebSocket((c) => {
      const request = {
        roomId: c.req.param("roomId") ?? "",
        playerId: Number(c.req.param("playerId")),
        playerName: c.req.param("playerName") ?? "",
        password: c.req.query("password"),
        address: getConnInfo(c).remote.address ?? "unknown",
      };
      let channel: RoomChannel | undefined;

      return {
        onOpen(_event, ws): void {
          channel = new RoomChannel({
            request,
            connection: new WebSocketConnection(ws),
            hub,
            limiter,
            config,
            createContext,
            dispatch: dispatchCommand,
            logger,
          });
          void channel.open();
        },
        onMessage(event): void {
          void channel?.receive(event.data);
        },
        onClose(): void {
          void channel?.close();
        },
        onError(event): void {
          logger.warn("WebSocket client error", { roomId: request.roomId, event });
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: env.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });
  injectWebSocket(server);

  const sweeper = setInterval(() => registry.sweep(), config.cleanupIntervalMs);
  sweeper.unref();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info("Shutting down", { signal, rooms: registry.size });
    clearInterval(sweeper);
    await rounds.shutdown();
    server.close((error?: Error) => {
      if (error) {
        logger.error("Server did not close cleanly", { error });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

void startServer().catch((error) => {
  createConsoleLogger("trivia-room").error("Failed to start server", { error });
  process.exit(1);
});
