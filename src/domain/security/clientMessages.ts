import { z } from "zod";

import type { ServerConfig } from "../ServerConfig.js";
import { GAME_MODES } from "../typedefs.js";

const setReadySchema = z.object({
  action: z.literal("set_ready"),
  is_ready: z.boolean().default(false),
});

const kickPlayerSchema = z.object({
  action: z.literal("kick_player"),
  player_id: z.number().int(),
});

const updateSettingsSchema = z.object({
  action: z.literal("update_settings"),
  settings: z.unknown(),
});

const startGameSchema = z.object({ action: z.literal("start_game") });

const guessSchema = z.object({ action: z.literal("guess"), text: z.string() });

const chatSchema = z.object({ action: z.literal("chat"), text: z.string() });

const getSuggestionsSchema = z.object({
  action: z.literal("get_suggestions"),
  query: z.string(),
});

export const clientActionSchema = z.discriminatedUnion("action", [
  setReadySchema,
  kickPlayerSchema,
  updateSettingsSchema,
  startGameSchema,
  guessSchema,
  chatSchema,
  getSuggestionsSchema,
]);

export type ClientAction = z.infer<typeof clientActionSchema>;

export type ParsedClientMessage =
  | { readonly ok: true; readonly action: ClientAction }
  | { readonly ok: false; readonly reply?: string };

type MessageLimits = Pick<ServerConfig, "maxMessageBytes" | "maxActionLength">;

/**
 * Turns one raw inbound frame into a validated action.
 * Oversized or unparsable frames carry a reply for the sender; anything else that does not
 * validate is dropped without one.
 */
export function parseClientMessage(raw: string, limits: MessageLimits): ParsedClientMessage {
  if (Buffer.byteLength(raw, "utf8") > limits.maxMessageBytes) {
    return { ok: false, reply: "Message too large" };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return { ok: false, reply: "Invalid message format" };
  }

  const envelope = z
    .object({ action: z.string().max(limits.maxActionLength) })
    .safeParse(payload);
  if (!envelope.success) {
    return { ok: false };
  }

  const parsed = clientActionSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false };
  }

  return { ok: true, action: parsed.data };
}

type SettingsLimits = Pick<
  ServerConfig,
  | "minRounds"
  | "maxRounds"
  | "minMusicDurationSeconds"
  | "maxMusicDurationSeconds"
  | "defaultTotalRounds"
  | "defaultMusicDurationSeconds"
>;

export function createSettingsSchema(limits: SettingsLimits) {
  return z.object({
    total_rounds: z
      .number()
      .int()
      .min(limits.minRounds)
      .max(limits.maxRounds)
      .default(limits.defaultTotalRounds),
    music_duration: z
      .number()
      .int()
      .min(limits.minMusicDurationSeconds)
      .max(limits.maxMusicDurationSeconds)
      .default(limits.defaultMusicDurationSeconds),
    game_type: z.enum(GAME_MODES).default("regular"),
  });
}
