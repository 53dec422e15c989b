import { join } from "path";
import { z } from "zod";
import type { CoverProviderName } from "./types";

export const COVER_PROVIDER_NAMES = [
  "lastfm",
  "spotify",
  "discogs",
  "audiodb",
  "musicbrainz",
] as const satisfies readonly CoverProviderName[];

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-haiku-latest";

const optionalString = z
  .string()
  .optional()
  .transform((v) => v?.trim() || undefined);

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .optional()
  .transform((v) => (v === undefined ? undefined : ["true", "1", "yes"].includes(v)));

const EnvSchema = z.object({
  AI_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  TRIVIA_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  TRIVIA_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(2000),
  TRIVIA_BACKOFF_CAP_MS: z.coerce.number().int().min(0).default(30_000),
  TRIVIA_CATEGORY_CATALOG: z.enum(["core", "extended"]).default("core"),
  TRIVIA_ALLOW_DUPLICATE_QUESTIONS: booleanFlag,
  COVER_PROVIDERS: optionalString,
  LASTFM_API_KEY: optionalString,
  SPOTIFY_CLIENT_ID: optionalString,
  SPOTIFY_CLIENT_SECRET: optionalString,
  DISCOGS_TOKEN: optionalString,
  AUDIODB_API_KEY: optionalString,
  MUSICBRAINZ_CONTACT: optionalString,
  MISSING_COVERS_LOG: optionalString,
  LOGS_DIR: optionalString,
});

export type AIProviderName = "openai" | "anthropic";
export type CategoryCatalogName = "core" | "extended";

export interface AppConfig {
  ai: {
    provider: AIProviderName;
    apiKey: string;
    model: string;
  };
  trivia: {
    maxAttempts: number;
    backoff: { baseMs: number; capMs: number };
    categoryCatalog: CategoryCatalogName;
    allowDuplicateQuestions: boolean;
  };
  covers: {
    order: CoverProviderName[];
    lastfmApiKey?: string;
    spotifyClientId?: string;
    spotifyClientSecret?: string;
    discogsToken?: string;
    audiodbApiKey?: string;
    musicbrainzContact?: string;
  };
  missingCoversLog: string;
  logsDir: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function isCoverProviderName(value: string): value is CoverProviderName {
  return COVER_PROVIDER_NAMES.some((name) => name === value);
}

export function parseCoverProviderOrder(raw: string | undefined): CoverProviderName[] {
  if (!raw) return [...COVER_PROVIDER_NAMES];

  const order: CoverProviderName[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim().toLowerCase();
    if (!name) continue;
    if (!isCoverProviderName(name)) {
      throw new ConfigError(
        `Unknown cover provider "${name}" in COVER_PROVIDERS (expected one of ${COVER_PROVIDER_NAMES.join(", ")})`,
      );
    }
    if (!order.includes(name)) order.push(name);
  }
  return order;
}

/**
 * Read and validate configuration from environment variables.
 * Throws ConfigError with every problem listed when the environment is unusable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const vars = parsed.data;

  const apiKey =
    vars.AI_PROVIDER === "openai" ? vars.OPENAI_API_KEY : vars.ANTHROPIC_API_KEY;
  if (!apiKey) {
    const key = vars.AI_PROVIDER === "openai" ? "OPENAI_API_KEY" : "ANTHROPIC_API_KEY";
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }

  if (vars.TRIVIA_BACKOFF_CAP_MS < vars.TRIVIA_BACKOFF_BASE_MS) {
    throw new ConfigError("TRIVIA_BACKOFF_CAP_MS must not be smaller than TRIVIA_BACKOFF_BASE_MS");
  }

  return {
    ai: {
      provider: vars.AI_PROVIDER,
      apiKey,
      model:
        vars.AI_PROVIDER === "openai"
          ? (vars.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL)
          : (vars.ANTHROPIC_MODEL ?? DEFAULT_ANTHROPIC_MODEL),
    },
    trivia: {
      maxAttempts: vars.TRIVIA_MAX_ATTEMPTS,
      backoff: {
        baseMs: vars.TRIVIA_BACKOFF_BASE_MS,
        capMs: vars.TRIVIA_BACKOFF_CAP_MS,
      },
      categoryCatalog: vars.TRIVIA_CATEGORY_CATALOG,
      allowDuplicateQuestions: vars.TRIVIA_ALLOW_DUPLICATE_QUESTIONS ?? true,
    },
    covers: {
      order: parseCoverProviderOrder(vars.COVER_PROVIDERS),
      lastfmApiKey: vars.LASTFM_API_KEY,
      spotifyClientId: vars.SPOTIFY_CLIENT_ID,
      spotifyClientSecret: vars.SPOTIFY_CLIENT_SECRET,
      discogsToken: vars.DISCOGS_TOKEN,
      audiodbApiKey: vars.AUDIODB_API_KEY,
      musicbrainzContact: vars.MUSICBRAINZ_CONTACT,
    },
    missingCoversLog: vars.MISSING_COVERS_LOG ?? "missing_covers.txt",
    logsDir: vars.LOGS_DIR ?? join(process.cwd(), "logs"),
  };
}
