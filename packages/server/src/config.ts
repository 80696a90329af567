import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ValidationRejectedError, createServerConfig, type ServerConfig } from "./core.js";

const DEFAULT_TITLES_PATH = fileURLToPath(new URL("../data/titles.json", import.meta.url));

const environmentSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  MAX_ROOMS: z.coerce.number().int().positive().default(100),
  MAX_CONNECTIONS_PER_IP: z.coerce.number().int().positive().default(5),
  TITLES_PATH: z.string().min(1).default(DEFAULT_TITLES_PATH),
  CLUE_SEARCH_URL: z.string().url().default("https://saavn.dev/api/search/albums"),
  CLUE_ALBUM_URL: z.string().url().default("https://saavn.dev/api/albums"),
  DEBUG: z.string().optional(),
});

export interface ServerEnvironment {
  readonly port: number;
  readonly titlesPath: string;
  readonly clueSearchUrl: string;
  readonly clueAlbumUrl: string;
  readonly debug: boolean;
  readonly config: ServerConfig;
}

export function loadEnvironment(
  env: Readonly<Record<string, string | undefined>> = process.env,
): ServerEnvironment {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    throw ValidationRejectedError.because(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    titlesPath: values.TITLES_PATH,
    clueSearchUrl: values.CLUE_SEARCH_URL,
    clueAlbumUrl: values.CLUE_ALBUM_URL,
    debug: Boolean(values.DEBUG),
    config: createServerConfig({
      maxRooms: values.MAX_ROOMS,
      maxConnectionsPerAddress: values.MAX_CONNECTIONS_PER_IP,
    }),
  };
}
