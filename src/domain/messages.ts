import type { GameMode, PlayerId, RoomId, SessionPhase } from "./typedefs.js";

/** Phase-redacted view of the current clue. */
export type ClueSnapshot =
  | { readonly preview_url: string }
  | {
      readonly preview_url: string;
      readonly title: string;
      readonly movie: string;
      readonly image: string;
    };

export interface PlayerSnapshot {
  readonly id: PlayerId;
  readonly name: string;
  readonly is_ready: boolean;
}

export interface SessionSnapshot {
  readonly room_id: RoomId;
  readonly host_id: PlayerId;
  readonly players: readonly PlayerSnapshot[];
  readonly phase: SessionPhase;
  readonly is_game_active: boolean;
  readonly is_round_active: boolean;
  readonly is_reveal_phase: boolean;
  readonly current_round: number;
  readonly total_rounds: number;
  readonly music_duration: number;
  readonly game_type: GameMode;
  readonly current_song: ClueSnapshot | null;
  readonly scores: Readonly<Record<string, number>>;
  readonly has_password: boolean;
}

export interface SettingsPayload {
  readonly total_rounds: number;
  readonly music_duration: number;
  readonly game_type: GameMode;
}

export type NotificationType =
  | "round_start"
  | "round_end"
  | "correct_guesses"
  | "wrong_guesses"
  | "no_guesses"
  | "game_over";

export interface GameNotification {
  readonly action: "game_notification";
  readonly type: NotificationType;
  readonly message: string;
  readonly correct_players?: readonly string[];
  readonly winner_id?: PlayerId;
  readonly winner_name?: string;
  readonly winner_score?: number;
}

export interface Winner {
  readonly player_id: PlayerId;
  readonly name: string;
  readonly score: number;
}

/** Every message the server sends over a room channel. */
export type ServerMessage =
  | { readonly action: "update_state"; readonly state: SessionSnapshot }
  | { readonly action: "settings_updated"; readonly settings: SettingsPayload }
  | { readonly action: "round_start"; readonly round: number; readonly total_rounds: number }
  | {
      readonly action: "round_end";
      readonly correct_answer: string;
      readonly song_title: string;
      readonly album_image: string;
      readonly scores: Readonly<Record<string, number>>;
    }
  | GameNotification
  | {
      readonly action: "guess_result";
      readonly correct: boolean;
      readonly points_earned: number;
    }
  | { readonly action: "chat_message"; readonly player_name: string; readonly text: string }
  | { readonly action: "suggestions"; readonly suggestions: readonly string[] }
  | { readonly action: "error"; readonly message: string }
  | {
      readonly action: "game_over";
      readonly leaderboard: Readonly<Record<string, number>>;
      readonly winner: Winner | null;
    };

export type ServerAction = ServerMessage["action"];
