import { randomInt } from "node:crypto";
import { Hono } from "hono";
import type { Context, Next } from "hono";
import { z } from "zod";

import {
  CapacityExceededError,
  MAX_PLAYER_ID,
  MIN_PLAYER_ID,
  sanitizeText,
  type BroadcastHub,
  type Logger,
  type PlayerId,
  type RoomRegistry,
  type ServerConfig,
} from "./core.js";

export interface CreateBackendAppOptions {
  readonly registry: RoomRegistry;
  readonly hub: BroadcastHub;
  readonly config: ServerConfig;
  readonly logger: Logger;
  readonly generatePlayerId?: () => PlayerId;
}

export function createBackendApp({
  registry,
  hub,
  config,
  logger,
  generatePlayerId = () => randomInt(MIN_PLAYER_ID, MAX_PLAYER_ID + 1),
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  const createRoomSchema = z.object({
    host_name: z.string().trim().min(1).max(config.maxNameLength),
    password: z.string().max(config.maxPasswordLength).optional(),
  });

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  const health = (c: Context) =>
    c.json({
      status: "healthy",
      active_rooms: registry.size,
      total_connections: hub.connectionCount(),
    });
  app.get("/health", health);
  app.get("/api/health", health);

  app.get("/api/rooms", (c: Context) => c.json(registry.listPublic()));

  app.post("/api/rooms", async (c: Context) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = createRoomSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "host_name is required" }, 400);
    }

    const hostName = sanitizeText(parsed.data.host_name, config.maxNameLength);
    if (!hostName) {
      return c.json({ error: "host_name is required" }, 400);
    }

    const hostId = generatePlayerId();
    const password = parsed.data.password?.trim() || undefined;

    try {
      const session = registry.create(hostId, hostName, password);
      return c.json({ room_id: session.id, host_id: hostId });
    } catch (error) {
      if (error instanceof CapacityExceededError) {
        logger.warn("Room creation refused", { reason: error.message });
        return c.json({ error: error.message }, 503);
      }
      logger.error("Failed to create room", { error });
      return c.json({ error: "Failed to create room" }, 500);
    }
  });

  return app;
}
