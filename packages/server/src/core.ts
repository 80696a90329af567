export type {
  Command,
  CommandContext,
  RoundRunner,
} from "@trivia-room/core/domain/commands/Command.js";
export { dispatchCommand } from "@trivia-room/core/domain/commands/dispatchCommand.js";
export { fromClientAction } from "@trivia-room/core/domain/commands/fromClientAction.js";
export { JoinRoom } from "@trivia-room/core/domain/commands/JoinRoom.js";
export { LeaveRoom } from "@trivia-room/core/domain/commands/LeaveRoom.js";
export type { Session } from "@trivia-room/core/domain/entities/Session.js";
export {
  AuthFailedError,
  CapacityExceededError,
  RoomNotFoundError,
  ValidationRejectedError,
  isPlayerFacingError,
} from "@trivia-room/core/domain/errors/index.js";
export type { ServerMessage } from "@trivia-room/core/domain/messages.js";
export type { BroadcastHub, Connection } from "@trivia-room/core/domain/ports/BroadcastHub.js";
export type {
  ClueCandidate,
  ClueProvider,
} from "@trivia-room/core/domain/ports/ClueProvider.js";
export type { Logger } from "@trivia-room/core/domain/ports/Logger.js";
export type { RoomRegistry } from "@trivia-room/core/domain/ports/RoomRegistry.js";
export type { Scheduler } from "@trivia-room/core/domain/ports/Scheduler.js";
export type { TitleProvider } from "@trivia-room/core/domain/ports/TitleProvider.js";
export { parseClientMessage } from "@trivia-room/core/domain/security/clientMessages.js";
export { ConnectionLimiter } from "@trivia-room/core/domain/security/ConnectionLimiter.js";
export { sanitizeText } from "@trivia-room/core/domain/security/sanitizeText.js";
export {
  MAX_PLAYER_ID,
  MIN_PLAYER_ID,
  isHttpUrl,
} from "@trivia-room/core/domain/security/validators.js";
export type { ServerConfig } from "@trivia-room/core/domain/ServerConfig.js";
export { createServerConfig } from "@trivia-room/core/domain/ServerConfig.js";
export { ClueDealer } from "@trivia-room/core/domain/services/ClueDealer.js";
export { RoundScheduler } from "@trivia-room/core/domain/services/RoundScheduler.js";
export type { PlayerId, RoomId, TimePoint } from "@trivia-room/core/domain/typedefs.js";
export { InMemoryBroadcastHub } from "@trivia-room/core/adapters/in-memory/InMemoryBroadcastHub.js";
export { InMemoryRoomRegistry } from "@trivia-room/core/adapters/in-memory/InMemoryRoomRegistry.js";
export { InMemoryTitleStore } from "@trivia-room/core/adapters/in-memory/InMemoryTitleStore.js";
