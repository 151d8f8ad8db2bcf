import { config as defaultConfig, type AppConfig } from "./config.js";
import { HistoryManager } from "./history/manager.js";
import { LlmSummarizer, type ChatCompletionsClient } from "./history/summarizer.js";
import type { Summarizer, Tokenizer } from "./history/types.js";
import { createLlmClient } from "./llm/client.js";
import { log } from "./logger.js";
import type { NativeEngineLoader } from "./memory/types.js";
import { VectorMemoryIndex } from "./memory/vector-index.js";

// ── Composition root ─────────────────────────────────────
// The chat orchestrator owns one ChatMemory and passes it where needed.

export interface ChatMemory {
  history: HistoryManager;
  vectors: VectorMemoryIndex;
}

export interface ChatMemoryDeps {
  /** Overrides the Gemini-backed summarizer */
  summarizer?: Summarizer;
  /** Client for the default summarizer; built from config when omitted */
  llmClient?: ChatCompletionsClient;
  tokenizer?: Tokenizer;
  nativeEngine?: NativeEngineLoader;
}

function resolveSummarizer(cfg: AppConfig, deps: ChatMemoryDeps): Summarizer | undefined {
  if (deps.summarizer) return deps.summarizer;
  if (!deps.llmClient && !cfg.llm.apiKey) {
    log.warn("⚠️ GEMINI_API_KEY not set, trimming without summaries");
    return undefined;
  }
  const client = deps.llmClient ?? createLlmClient(cfg.llm);
  return new LlmSummarizer(client, { model: cfg.llm.summarizationModel });
}

export function createChatMemory(
  cfg: AppConfig = defaultConfig,
  deps: ChatMemoryDeps = {},
): ChatMemory {
  const history = new HistoryManager({
    ...cfg.history,
    summarizer: resolveSummarizer(cfg, deps),
    tokenizer: deps.tokenizer,
  });

  const vectors = new VectorMemoryIndex({
    dimension: cfg.rag.dimension,
    similarityThreshold: cfg.rag.similarityThreshold,
    native: deps.nativeEngine,
  });

  log.info(
    {
      keepRecent: cfg.history.keepRecent,
      maxHistory: cfg.history.maxHistory,
      summaries: history.hasSummarizer,
      dimension: vectors.dimension,
      native: vectors.isNative,
    },
    "🧠 Chat memory ready",
  );

  return { history, vectors };
}
