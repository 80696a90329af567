import type { Clue } from "./typedefs.js";

export interface ServerConfig {
  readonly maxRooms: number;
  readonly maxPlayersPerRoom: number;
  readonly minRounds: number;
  readonly maxRounds: number;
  readonly minMusicDurationSeconds: number;
  readonly maxMusicDurationSeconds: number;
  readonly defaultTotalRounds: number;
  readonly defaultMusicDurationSeconds: number;
  readonly revealDurationMs: number;
  readonly providerTimeoutMs: number;
  readonly cleanupIntervalMs: number;
  readonly inactiveTimeoutMs: number;
  readonly maxTextLength: number;
  readonly maxNameLength: number;
  readonly maxPasswordLength: number;
  readonly maxMessageBytes: number;
  readonly maxActionLength: number;
  readonly maxConnectionsPerAddress: number;
  readonly minSuggestionQueryLength: number;
  readonly maxSuggestionQueryLength: number;
  readonly maxSuggestions: number;
  readonly maxPublicRooms: number;
  readonly fallbackClue: Clue;
}

export type ServerConfigOverrides = Partial<ServerConfig>;

export const DEMO_CLUE: Clue = {
  title: "Demo Song",
  answer: "Demo Movie",
  audioUrl: "https://www.soundhelix.com/examples/mp3/SoundHelix-Song-1.mp3",
  imageUrl: "https://via.placeholder.com/300x300?text=Demo+Album",
};

export function createServerConfig(overrides: ServerConfigOverrides = {}): ServerConfig {
  return {
    maxRooms: overrides.maxRooms ?? 100,
    maxPlayersPerRoom: overrides.maxPlayersPerRoom ?? 10,
    minRounds: overrides.minRounds ?? 5,
    maxRounds: overrides.maxRounds ?? 20,
    minMusicDurationSeconds: overrides.minMusicDurationSeconds ?? 15,
    maxMusicDurationSeconds: overrides.maxMusicDurationSeconds ?? 60,
    defaultTotalRounds: overrides.defaultTotalRounds ?? 10,
    defaultMusicDurationSeconds: overrides.defaultMusicDurationSeconds ?? 30,
    revealDurationMs: overrides.revealDurationMs ?? 10_000,
    providerTimeoutMs: overrides.providerTimeoutMs ?? 10_000,
    cleanupIntervalMs: overrides.cleanupIntervalMs ?? 10 * 60_000,
    inactiveTimeoutMs: overrides.inactiveTimeoutMs ?? 2 * 60 * 60_000,
    maxTextLength: overrides.maxTextLength ?? 100,
    maxNameLength: overrides.maxNameLength ?? 50,
    maxPasswordLength: overrides.maxPasswordLength ?? 100,
    maxMessageBytes: overrides.maxMessageBytes ?? 1024,
    maxActionLength: overrides.maxActionLength ?? 50,
    maxConnectionsPerAddress: overrides.maxConnectionsPerAddress ?? 5,
    minSuggestionQueryLength: overrides.minSuggestionQueryLength ?? 2,
    maxSuggestionQueryLength: overrides.maxSuggestionQueryLength ?? 50,
    maxSuggestions: overrides.maxSuggestions ?? 10,
    maxPublicRooms: overrides.maxPublicRooms ?? 20,
    fallbackClue: overrides.fallbackClue ?? DEMO_CLUE,
  };
}
