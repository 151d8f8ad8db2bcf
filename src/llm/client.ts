import OpenAI from "openai";
import type { AppConfig } from "../config.js";
import { ConfigError } from "../errors.js";

// ── LLM Client: Gemini via the OpenAI-compatible API ─────

/** Build a chat-completions client for the summarization model. */
export function createLlmClient(llmConfig: AppConfig["llm"]): OpenAI {
  if (!llmConfig.apiKey) {
    throw new ConfigError("GEMINI_API_KEY is required to create the LLM client");
  }

  return new OpenAI({
    baseURL: llmConfig.baseURL,
    apiKey: llmConfig.apiKey,
    // Retries are handled by withRetry so they can honour abort signals
    maxRetries: 0,
  });
}
