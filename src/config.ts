import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

dotenv.config();

// ── Helpers ──────────────────────────────────────────────

/** Unset and empty env vars both fall through to the schema default. */
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema,
  );
}

const count = (fallback: number) =>
  fromEnv(z.coerce.number().int().nonnegative().default(fallback));

// ── Schema ───────────────────────────────────────────────

const envSchema = z.object({
  // History trimming
  HISTORY_KEEP_RECENT: count(200),
  HISTORY_MAX_MESSAGES: fromEnv(z.coerce.number().int().positive().default(10_000)),
  HISTORY_COMPRESS_THRESHOLD: count(2_000),
  HISTORY_MAX_TOKENS: fromEnv(z.coerce.number().int().positive().default(1_200_000)),
  HISTORY_RESERVE_TOKENS: count(2_000),

  // Vector memory
  RAG_DIMENSION: fromEnv(z.coerce.number().int().positive().default(384)),
  RAG_SIMILARITY_THRESHOLD: fromEnv(z.coerce.number().min(-1).max(1).default(0.7)),

  // Summarizer: Gemini through its OpenAI-compatible endpoint
  GEMINI_API_KEY: fromEnv(z.string().optional()),
  GEMINI_BASE_URL: fromEnv(
    z
      .string()
      .url()
      .default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  ),
  GEMINI_SUMMARIZATION_MODEL: fromEnv(z.string().default("gemini-2.5-flash")),
});

// ── Config ───────────────────────────────────────────────

export interface AppConfig {
  history: {
    keepRecent: number;
    maxHistory: number;
    compressThreshold: number;
    maxTokens: number;
    reserveTokens: number;
  };
  rag: {
    dimension: number;
    similarityThreshold: number;
  };
  llm: {
    apiKey: string | undefined;
    baseURL: string;
    summarizationModel: string;
  };
}

/** Parse and validate configuration from an env-like record. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid environment configuration",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }

  const e = parsed.data;
  return {
    history: {
      keepRecent: e.HISTORY_KEEP_RECENT,
      maxHistory: e.HISTORY_MAX_MESSAGES,
      compressThreshold: e.HISTORY_COMPRESS_THRESHOLD,
      maxTokens: e.HISTORY_MAX_TOKENS,
      reserveTokens: e.HISTORY_RESERVE_TOKENS,
    },
    rag: {
      dimension: e.RAG_DIMENSION,
      similarityThreshold: e.RAG_SIMILARITY_THRESHOLD,
    },
    llm: {
      apiKey: e.GEMINI_API_KEY,
      baseURL: e.GEMINI_BASE_URL,
      summarizationModel: e.GEMINI_SUMMARIZATION_MODEL,
    },
  };
}

export const config: AppConfig = loadConfig();
