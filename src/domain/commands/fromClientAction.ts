import type { Connection } from "../ports/BroadcastHub.js";
import type { ClientAction } from "../security/clientMessages.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import type { Command } from "./Command.js";
import { GetSuggestions } from "./GetSuggestions.js";
import { KickPlayer } from "./KickPlayer.js";
import { SendChat } from "./SendChat.js";
import { SetReady } from "./SetReady.js";
import { StartGame } from "./StartGame.js";
import { SubmitGuess } from "./SubmitGuess.js";
import { UpdateSettings } from "./UpdateSettings.js";

export interface ActionOrigin {
  readonly roomId: RoomId;
  readonly playerId: PlayerId;
  readonly connection: Connection;
}

export function fromClientAction(
  action: ClientAction,
  { roomId, playerId, connection }: ActionOrigin,
  at: TimePoint,
): Command {
  switch (action.action) {
    case "set_ready":
      return new SetReady(roomId, playerId, action.is_ready, at);
    case "kick_player":
      return new KickPlayer(roomId, playerId, action.player_id, at);
    case "update_settings":
      return new UpdateSettings(roomId, playerId, action.settings, at);
    case "start_game":
      return new StartGame(roomId, playerId, at);
    case "guess":
      return new SubmitGuess(roomId, playerId, action.text, connection, at);
    case "chat":
      return new SendChat(roomId, playerId, action.text, at);
    case "get_suggestions":
      return new GetSuggestions(action.query, connection, at);
  }
}
