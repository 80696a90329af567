import { vi, type Mock } from "vitest";

import { InMemoryBroadcastHub } from "../../src/adapters/in-memory/InMemoryBroadcastHub.js";
import { InMemoryRoomRegistry } from "../../src/adapters/in-memory/InMemoryRoomRegistry.js";
import { InMemoryTitleStore } from "../../src/adapters/in-memory/InMemoryTitleStore.js";
import type { CommandContext, RoundRunner } from "../../src/domain/commands/Command.js";
import type { ServerMessage } from "../../src/domain/messages.js";
import type { Connection } from "../../src/domain/ports/BroadcastHub.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import {
  createServerConfig,
  type ServerConfig,
  type ServerConfigOverrides,
} from "../../src/domain/ServerConfig.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

export interface LoggerMock extends Logger {
  readonly info: Fn<Logger["info"]>;
  readonly warn: Fn<Logger["warn"]>;
  readonly error: Fn<Logger["error"]>;
  readonly debug: Fn<NonNullable<Logger["debug"]>>;
}

export function createLoggerMock(): LoggerMock {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    debug: vi.fn<NonNullable<Logger["debug"]>>(),
  };
}

/** Records what the server sends; can be told to fail every send. */
export class FakeConnection implements Connection {
  readonly sent: ServerMessage[] = [];
  closed: { readonly code: number; readonly reason: string } | undefined;
  failing = false;

  send(data: string): void {
    if (this.failing) {
      throw new Error("socket closed");
    }
    this.sent.push(JSON.parse(data));
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }

  actions(): string[] {
    return this.sent.map((message) => message.action);
  }

  lastOf<A extends ServerMessage["action"]>(
    action: A,
  ): Extract<ServerMessage, { action: A }> | undefined {
    const matches = this.sent.filter(
      (message): message is Extract<ServerMessage, { action: A }> => message.action === action,
    );
    return matches[matches.length - 1];
  }
}

export interface RoundRunnerMock extends RoundRunner {
  readonly start: Fn<RoundRunner["start"]>;
  readonly cancel: Fn<RoundRunner["cancel"]>;
  readonly isRunning: Fn<RoundRunner["isRunning"]>;
}

export function createRoundRunnerMock(): RoundRunnerMock {
  return {
    start: vi.fn<RoundRunner["start"]>().mockReturnValue(true),
    cancel: vi.fn<RoundRunner["cancel"]>(),
    isRunning: vi.fn<RoundRunner["isRunning"]>().mockReturnValue(false),
  };
}

export const TEST_TITLES = [
  "Monsoon Letters",
  "Moonlight Harbour",
  "The Paper Kite",
  "Desert Rose",
] as const;

export interface TestContextOverrides {
  readonly config?: ServerConfigOverrides;
  readonly rounds?: RoundRunner;
  readonly now?: () => number;
  readonly roomIds?: readonly string[];
}

export interface TestContext extends CommandContext {
  readonly registry: InMemoryRoomRegistry;
  readonly hub: InMemoryBroadcastHub;
  readonly titles: InMemoryTitleStore;
  readonly config: ServerConfig;
  readonly logger: LoggerMock;
}

export function createTestContext(overrides: TestContextOverrides = {}): TestContext {
  const config = createServerConfig(overrides.config);
  const logger = createLoggerMock();
  const ids = [...(overrides.roomIds ?? ["ROOM01", "ROOM02", "ROOM03", "ROOM04"])];
  let next = 0;

  return {
    registry: new InMemoryRoomRegistry({
      config,
      logger,
      now: overrides.now ?? (() => 1_000),
      generateId: () => ids[next++ % ids.length] ?? "ROOM01",
    }),
    hub: new InMemoryBroadcastHub(logger),
    rounds: overrides.rounds ?? createRoundRunnerMock(),
    titles: new InMemoryTitleStore(TEST_TITLES, { limits: config, random: () => 0 }),
    config,
    logger,
  };
}
