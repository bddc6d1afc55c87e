import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";
import type { LogFormat, LogLevel } from "./logger.js";

/**
 * Configuration Management
 * Loads and validates all config from environment variables
 */

const PROVIDER_IDS = ["firecrawl", "newsdata", "tavily"] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

const providerList = z
  .string()
  .default(PROVIDER_IDS.join(","))
  .transform((raw) =>
    raw
      .split(",")
      .map((p) => p.trim())
      .filter((p) => p.length > 0)
  )
  .pipe(z.array(z.enum(PROVIDER_IDS)));

const envSchema = z.object({
  // Anthropic (required only when a real reasoning call is made)
  ANTHROPIC_API_KEY: z.string().optional(),

  // Evidence providers
  FIRECRAWL_API_KEY: z.string().optional(),
  NEWSDATA_API_KEY: z.string().optional(),
  TAVILY_API_KEY: z.string().optional(),
  ENABLED_PROVIDERS: providerList,

  // Persistence
  SESSION_STORE: z.enum(["memory", "file", "supabase"]).default("file"),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),
  DATA_DIR: z.string().default("./data"),

  // Tuning
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  STAGE_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  SCHEMA_RETRIES: z.coerce.number().int().min(0).max(3).default(1),
  RETAINED_RUNS: z.coerce.number().int().positive().default(100),
  HISTORY_CAP: z.coerce.number().int().positive().default(20),
  RETRIEVAL_K: z.coerce.number().int().positive().default(5),
  RETRIEVAL_THRESHOLD: z.coerce.number().min(-1).max(1).default(0),
});

export type Env = z.infer<typeof envSchema>;

export type ModelTier = "haiku" | "sonnet";

/**
 * Per-stage reasoning profile
 */
export interface StageProfile {
  model: ModelTier;
  maxTurns: number;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export interface Config {
  anthropic: {
    apiKey?: string;
  };

  providers: {
    enabled: ProviderId[];
    timeoutMs: number;
    timeouts: Partial<Record<ProviderId, number>>;
    maxRetries: number;
    backoffMs: number;
    keys: Partial<Record<ProviderId, string>>;
    cache: {
      maxEntries: number;
      ttlMs: number;
    };
  };

  stages: {
    maxRetries: number;
    schemaRetries: number;
    /** Which stages may proceed on a degraded artifact */
    allowDegraded: {
      reader: boolean;
      analyst: boolean;
      strategist: boolean;
      formatter: boolean;
    };
    /** Formatter falls back to a templated summary when its call fails */
    formatterTemplateFallback: boolean;
    /** Finished runs whose progress log and status stay queryable */
    retainedRuns: number;
  };

  store: {
    kind: "memory" | "file" | "supabase";
    dataDir: string;
    supabase?: {
      url: string;
      key: string;
    };
  };

  retrieval: {
    k: number;
    threshold: number;
    chunkSize: number;
    chunkOverlap: number;
    dimensions: number;
    embedTimeoutMs: number;
  };

  assistant: {
    historyCap: number;
    promptHistoryTurns: number;
  };

  defaults: {
    logLevel: LogLevel;
    logFormat: LogFormat;
  };

  // ============================================================
  // STAGE PROFILES
  // Reasoning stages use the larger model; the assistant uses the
  // fast one so follow-up answers stay interactive
  // ============================================================
  profiles: {
    reader: StageProfile;
    analyst: StageProfile;
    strategist: StageProfile;
    formatter: StageProfile;
    assistant: StageProfile;
  };
}

export type ProfileName = keyof Config["profiles"];

/**
 * Build a validated config from an env-like record
 */
export function loadConfig(source: NodeJS.ProcessEnv | Record<string, string | undefined> = process.env): Config {
  // blank entries in .env count as unset
  const present = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined && value !== ""));
  const parseResult = envSchema.safeParse(present);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  if (env.SESSION_STORE === "supabase" && (!env.SUPABASE_URL || !env.SUPABASE_KEY)) {
    throw new ConfigError("SESSION_STORE=supabase requires SUPABASE_URL and SUPABASE_KEY");
  }

  const stageProfile = (model: ModelTier, timeoutMs: number): StageProfile => ({
    model,
    maxTurns: 1,
    timeoutMs,
    retries: env.STAGE_MAX_RETRIES,
    backoffMs: 1000,
  });

  return {
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
    },

    providers: {
      enabled: env.ENABLED_PROVIDERS,
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      timeouts: {
        // Firecrawl scrapes every hit, so it gets more headroom
        firecrawl: env.PROVIDER_TIMEOUT_MS * 2,
      },
      maxRetries: env.PROVIDER_MAX_RETRIES,
      backoffMs: 500,
      keys: {
        firecrawl: env.FIRECRAWL_API_KEY,
        newsdata: env.NEWSDATA_API_KEY,
        tavily: env.TAVILY_API_KEY,
      },
      cache: {
        maxEntries: 100,
        ttlMs: 60 * 60 * 1000,
      },
    },

    stages: {
      maxRetries: env.STAGE_MAX_RETRIES,
      schemaRetries: env.SCHEMA_RETRIES,
      allowDegraded: {
        reader: true,
        analyst: true,
        strategist: true,
        formatter: true,
      },
      formatterTemplateFallback: true,
      retainedRuns: env.RETAINED_RUNS,
    },

    store: {
      kind: env.SESSION_STORE,
      dataDir: env.DATA_DIR,
      supabase:
        env.SUPABASE_URL && env.SUPABASE_KEY
          ? { url: env.SUPABASE_URL, key: env.SUPABASE_KEY }
          : undefined,
    },

    retrieval: {
      k: env.RETRIEVAL_K,
      threshold: env.RETRIEVAL_THRESHOLD,
      chunkSize: 1000,
      chunkOverlap: 200,
      dimensions: 256,
      embedTimeoutMs: 5000,
    },

    assistant: {
      historyCap: env.HISTORY_CAP,
      promptHistoryTurns: 10,
    },

    defaults: {
      logLevel: env.LOG_LEVEL,
      logFormat: env.LOG_FORMAT,
    },

    profiles: {
      reader: stageProfile("sonnet", 120_000),
      analyst: stageProfile("sonnet", 180_000),
      strategist: stageProfile("sonnet", 180_000),
      formatter: stageProfile("sonnet", 120_000),
      assistant: { ...stageProfile("haiku", 30_000), retries: 1 },
    },
  };
}

let configInstance: Config | null = null;

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function getProfile(name: ProfileName): StageProfile {
  return getConfig().profiles[name];
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export const config = {
  get: getConfig,
  load: loadConfig,
  getProfile,
  reset: resetConfig,
};
