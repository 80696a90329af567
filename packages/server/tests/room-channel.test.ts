import { describe, expect, it, vi } from "vitest";

import { dispatchCommand, type Command, type CommandContext } from "../src/core.js";
import { RoomChannel, type RoomChannelRequest } from "../src/roomChannel.js";
import {
  RecordingConnection,
  createServerTestContext,
  type ServerTestContext,
} from "./support/testContext.js";

const HOST = 10001;
const GUEST = 10002;

function openChannel(
  ctx: ServerTestContext,
  request: Partial<RoomChannelRequest> & Pick<RoomChannelRequest, "roomId">,
  dispatch: (command: Command, context: CommandContext) => Promise<void> = dispatchCommand,
) {
  const connection = new RecordingConnection();
  const channel = new RoomChannel({
    request: {
      playerId: GUEST,
      playerName: "Ben",
      password: undefined,
      address: "10.0.0.1",
      ...request,
    },
    connection,
    hub: ctx.hub,
    limiter: ctx.limiter,
    config: ctx.config,
    createContext: ctx.createContext,
    dispatch,
    now: () => 5_000,
    logger: ctx.logger,
  });
  return { channel, connection };
}

describe("RoomChannel", () => {
  it("admits a player and pushes the room state", async () => {
    const ctx = createServerTestContext();
    const session = ctx.registry.create(HOST, "Asha");
    const { channel, connection } = openChannel(ctx, { roomId: session.id });

    await channel.open();

    expect(channel.admitted).toBe(true);
    expect(session.hasPlayer(GUEST)).toBe(true);
    expect(connection.sent.map((message) => message.action)).toEqual(["update_state"]);
    expect(ctx.limiter.count("10.0.0.1")).toBe(1);
  });

  it("closes with a policy violation for a missing room", async () => {
    const ctx = createServerTestContext();
    const { channel, connection } = openChannel(ctx, { roomId: "NOROOM" });

    await channel.open();

    expect(connection.sent).toEqual([{ action: "error", message: "Room not found" }]);
    expect(connection.closed).toEqual({ code: 1008, reason: "Room not found" });
    expect(ctx.limiter.count("10.0.0.1")).toBe(0);
  });

  it("closes with a policy violation for a wrong password", async () => {
    const ctx = createServerTestContext();
    const session = ctx.registry.create(HOST, "Asha", "test-secret");
    const { channel, connection } = openChannel(ctx, { roomId: session.id, password: "guess" });

    await channel.open();

    expect(connection.closed).toEqual({ code: 1008, reason: "Invalid password" });
    expect(session.hasPlayer(GUEST)).toBe(false);
  });

  it("closes with a policy violation when the room is full", async () => {
    const ctx = createServerTestContext({ maxPlayersPerRoom: 1 });
    const session = ctx.registry.create(HOST, "Asha");
    const { channel, connection } = openChannel(ctx, { roomId: session.id });

    await channel.open();

    expect(connection.closed).toEqual({ code: 1008, reason: "Room is full" });
  });

  it("rejects malformed request parameters", async () => {
    const ctx = createServerTestContext();
    const { channel, connection } = openChannel(ctx, { roomId: "lower", playerId: 5 });

    await channel.open();

    expect(connection.closed).toEqual({
      code: 1008,
      reason: "Invalid input: Invalid room ID format; Invalid client ID",
    });
    expect(ctx.limiter.count("10.0.0.1")).toBe(0);
  });

  it("limits connections per address", async () => {
    const ctx = createServerTestContext({ maxConnectionsPerAddress: 1 });
    const session = ctx.registry.create(HOST, "Asha");
    await openChannel(ctx, { roomId: session.id, playerId: HOST, playerName: "Asha" }).channel.open();

    const { channel, connection } = openChannel(ctx, { roomId: session.id });
    await channel.open();

    expect(connection.closed).toEqual({ code: 1008, reason: "Too many connections from this IP" });
    expect(channel.admitted).toBe(false);
    expect(session.hasPlayer(GUEST)).toBe(false);
  });

  it("dispatches parsed actions", async () => {
    const ctx = createServerTestContext();
    const session = ctx.registry.create(HOST, "Asha");
    const { channel, connection } = openChannel(ctx, { roomId: session.id });
    await channel.open();

    await channel.receive(JSON.stringify({ action: "chat", text: "hello" }));

    expect(connection.sent.at(-1)).toEqual({
      action: "chat_message",
      player_name: "Ben",
      text: "hello",
    });
  });

  it("answers oversized and malformed frames", async () => {
    const ctx = createServerTestContext();
    const session = ctx.registry.create(HOST, "Asha");
    const { channel, connection } = openChannel(ctx, { roomId: session.id });
    await channel.open();

    await channel.receive("x".repeat(2_000));
    await channel.receive("{nope");
    await channel.receive(new Uint8Array([1, 2, 3]));
    await channel.receive(JSON.stringify({ action: "dance" }));

    expect(connection.sent.slice(1)).toEqual([
      { action: "error", message: "Message too large" },
      { action: "error", message: "Invalid message format" },
      { action: "error", message: "Invalid message format" },
    ]);
  });

  it("forwards player-facing errors and hides internal ones", async () => {
    const ctx = createServerTestContext();
    const session = ctx.registry.create(HOST, "Asha");
    const failing = vi.fn(async (command: Command, context: CommandContext) => {
      if (command.type === "SendChat") {
        throw new Error("database on fire");
      }
      await dispatchCommand(command, context);
    });
    const { channel, connection } = openChannel(
      ctx,
      { roomId: session.id, playerId: HOST, playerName: "Asha" },
      failing,
    );
    await channel.open();

    await channel.receive(JSON.stringify({ action: "update_settings", settings: { total_rounds: 99 } }));
    await channel.receive(JSON.stringify({ action: "chat", text: "hi" }));

    expect(connection.sent.slice(1)).toEqual([
      { action: "error", message: "Invalid settings format" },
      { action: "error", message: "Something went wrong" },
    ]);
  });

  it("leaves the room and frees the slot on close", async () => {
    const ctx = createServerTestContext();
    const session = ctx.registry.create(HOST, "Asha");
    const { channel } = openChannel(ctx, { roomId: session.id });
    await channel.open();

    await channel.close();
    await channel.close();

    expect(session.hasPlayer(GUEST)).toBe(false);
    expect(ctx.limiter.count("10.0.0.1")).toBe(0);
    expect(ctx.hub.connectionCount(session.id)).toBe(0);
  });

  it("ignores frames after close", async () => {
    const ctx = createServerTestContext();
    const session = ctx.registry.create(HOST, "Asha");
    const { channel, connection } = openChannel(ctx, { roomId: session.id });
    await channel.open();
    await channel.close();
    const sent = connection.sent.length;

    await channel.receive(JSON.stringify({ action: "chat", text: "late" }));

    expect(connection.sent).toHaveLength(sent);
  });
});
