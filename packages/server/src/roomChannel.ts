/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import {
  AuthFailedError,
  CapacityExceededError,
  JoinRoom,
  LeaveRoom,
  RoomNotFoundError,
  fromClientAction,
  isPlayerFacingError,
  parseClientMessage,
} from "./core.js";
import type {
  BroadcastHub,
  Command,
  CommandContext,
  Connection,
  ConnectionLimiter,
  Logger,
  PlayerId,
  RoomId,
  ServerConfig,
  TimePoint,
} from "./core.js";

type DispatchCommand = (command: Command, context: CommandContext) => Promise<void>;

const POLICY_VIOLATION = 1008;
const GENERIC_ERROR = "Something went wrong";

export interface RoomChannelRequest {
  readonly roomId: RoomId;
  readonly playerId: PlayerId;
  readonly playerName: string;
  readonly password: string | undefined;
  readonly address: string;
}

export interface RoomChannelOptions {
  readonly request: RoomChannelRequest;
  readonly connection: Connection;
  readonly hub: BroadcastHub;
  readonly limiter: ConnectionLimiter;
  readonly config: ServerConfig;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
  readonly now?: () => TimePoint;
  readonly logger?: Logger;
}

/**
 * One client's room session over a socket: admission, inbound actions, and departure.
 * Events are handled one at a time in arrival order.
 */
export class RoomChannel {
  #queue: Promise<void> = Promise.resolve();
  #admitted = false;
  #holdsSlot = false;
  #closed = false;
  readonly #request: RoomChannelRequest;
  readonly #connection: Connection;
  readonly #hub: BroadcastHub;
  readonly #limiter: ConnectionLimiter;
  readonly #config: ServerConfig;
  readonly #createContext: () => CommandContext;
  readonly #dispatch: DispatchCommand;
  readonly #now: () => TimePoint;
  readonly #logger: Logger | undefined;

  constructor(options: RoomChannelOptions) {
    this.#request = options.request;
    this.#connection = options.connection;
    this.#hub = options.hub;
    this.#limiter = options.limiter;
    this.#config = options.config;
    this.#createContext = options.createContext;
    this.#dispatch = options.dispatch;
    this.#now = options.now ?? Date.now;
    this.#logger = options.logger;
  }

  get admitted(): boolean {
    return this.#admitted;
  }

  open(): Promise<void> {
    return this.#enqueue(() => this.#admit());
  }

  receive(raw: unknown): Promise<void> {
    return this.#enqueue(() => this.#handle(raw));
  }

  close(): Promise<void> {
    return this.#enqueue(() => this.#leave());
  }

  #enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.#queue.then(task).catch((error: unknown) => {
      this.#logger?.error("Room channel task failed", {
        roomId: this.#request.roomId,
        playerId: this.#request.playerId,
        error,
      });
    });
    this.#queue = next;
    return next;
  }

  async #admit(): Promise<void> {
    const { roomId, playerId, playerName, password, address } = this.#request;

    let join: JoinRoom;
    try {
      join = new JoinRoom(roomId, playerId, playerName, password, this.#connection, this.#now());
    } catch (error) {
      await this.#reject(error);
      return;
    }

    if (!this.#limiter.tryAcquire(address)) {
      this.#logger?.warn("Connection limit reached", { address });
      this.#connection.close(POLICY_VIOLATION, "Too many connections from this IP");
      return;
    }
    this.#holdsSlot = true;

    try {
      await this.#dispatch(join, this.#createContext());
      this.#admitted = true;
    } catch (error) {
      this.#releaseSlot();
      await this.#reject(error);
    }
  }

  async #handle(raw: unknown): Promise<void> {
    if (!this.#admitted || this.#closed) {
      return;
    }

    if (typeof raw !== "string") {
      await this.#reply("Invalid message format");
      return;
    }

    const parsed = parseClientMessage(raw, this.#config);
    if (!parsed.ok) {
      if (parsed.reply) {
        await this.#reply(parsed.reply);
      }
      return;
    }

    const { roomId, playerId } = this.#request;
    const command = fromClientAction(
      parsed.action,
      { roomId, playerId, connection: this.#connection },
      this.#now(),
    );

    try {
      await this.#dispatch(command, this.#createContext());
    } catch (error) {
      await this.#reply(isPlayerFacingError(error) ? error.message : GENERIC_ERROR);
    }
  }

  async #leave(): Promise<void> {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    this.#releaseSlot();

    if (!this.#admitted) {
      return;
    }

    const { roomId, playerId } = this.#request;
    try {
      await this.#dispatch(
        new LeaveRoom(roomId, playerId, this.#connection, this.#now()),
        this.#createContext(),
      );
    } catch (error) {
      this.#logger?.warn("Failed to leave room cleanly", { roomId, playerId, error });
    }
  }

  async #reject(error: unknown): Promise<void> {
    const reason = admissionFailureReason(error);
    this.#logger?.info("Connection rejected", {
      roomId: this.#request.roomId,
      playerId: this.#request.playerId,
      reason,
    });
    await this.#reply(reason);
    this.#connection.close(POLICY_VIOLATION, reason);
  }

  #reply(message: string): Promise<void> {
    return this.#hub.unicast(this.#connection, { action: "error", message });
  }

  #releaseSlot(): void {
    if (this.#holdsSlot) {
      this.#holdsSlot = false;
      this.#limiter.release(this.#request.address);
    }
  }
}

function admissionFailureReason(error: unknown): string {
  if (error instanceof RoomNotFoundError) {
    return "Room not found";
  }
  if (error instanceof AuthFailedError) {
    return "Invalid password";
  }
  if (error instanceof CapacityExceededError) {
    return "Room is full";
  }
  if (isPlayerFacingError(error)) {
    return error.message;
  }
  return GENERIC_ERROR;
}
