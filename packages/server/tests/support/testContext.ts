import { vi } from "vitest";

import {
  ConnectionLimiter,
  InMemoryBroadcastHub,
  InMemoryRoomRegistry,
  InMemoryTitleStore,
  createServerConfig,
  type CommandContext,
  type Connection,
  type Logger,
  type RoundRunner,
  type ServerConfig,
  type ServerMessage,
} from "../../src/core.js";

export function createSilentLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export class RecordingConnection implements Connection {
  readonly sent: ServerMessage[] = [];
  closed: { readonly code: number; readonly reason: string } | undefined;

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }
}

export interface ServerTestContext {
  readonly config: ServerConfig;
  readonly registry: InMemoryRoomRegistry;
  readonly hub: InMemoryBroadcastHub;
  readonly limiter: ConnectionLimiter;
  readonly logger: Logger;
  readonly rounds: RoundRunner;
  readonly createContext: () => CommandContext;
}

export function createServerTestContext(
  overrides: Parameters<typeof createServerConfig>[0] = {},
): ServerTestContext {
  const config = createServerConfig(overrides);
  const logger = createSilentLogger();
  const registry = new InMemoryRoomRegistry({ config, logger });
  const hub = new InMemoryBroadcastHub(logger);
  const limiter = new ConnectionLimiter(config.maxConnectionsPerAddress);
  const titles = new InMemoryTitleStore(["Golden Hour", "Paper Boats"], { limits: config });
  const rounds: RoundRunner = {
    start: vi.fn(() => true),
    cancel: vi.fn(),
    isRunning: vi.fn(() => false),
  };

  return {
    config,
    registry,
    hub,
    limiter,
    logger,
    rounds,
    createContext: () => ({ registry, hub, rounds, titles, config, logger }),
  };
}
