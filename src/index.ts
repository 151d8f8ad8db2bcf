export { config, loadConfig, type AppConfig } from "./config.js";
export { ConfigError, DimensionMismatchError, SnapshotFormatError } from "./errors.js";
export { log, componentLogger, type Logger } from "./logger.js";

export {
  HistoryManager,
  type HistoryLimits,
  type HistoryManagerOptions,
  type TrimOptions,
} from "./history/manager.js";
export { getMessageContent } from "./history/content.js";
export {
  IMPORTANCE_RULES,
  IMPORTANT_SCORE,
  scoreMessage,
  type ImportanceRule,
} from "./history/importance.js";
export { TokenEstimator, MESSAGE_OVERHEAD_TOKENS } from "./history/tokens.js";
export { extractUserFacts } from "./history/facts.js";
export {
  LlmSummarizer,
  renderConversation,
  type ChatCompletionsClient,
  type LlmSummarizerOptions,
} from "./history/summarizer.js";
export type {
  HistoryStats,
  ImportanceScore,
  Message,
  MessagePart,
  MessageRole,
  Summarizer,
  Tokenizer,
  Transcript,
  UserFacts,
} from "./history/types.js";

export { VectorMemoryIndex, type VectorMemoryIndexOptions } from "./memory/vector-index.js";
export { cosineSimilarity, timeDecay, vectorNorm } from "./memory/similarity.js";
export { FallbackBackend } from "./memory/fallback-backend.js";
export { NativeBackend } from "./memory/native-backend.js";
export { SNAPSHOT_VERSION, type MemorySnapshot } from "./memory/snapshot.js";
export { buildMemoryContext, type MemoryContext } from "./memory/context-builder.js";
export type {
  MemoryEntry,
  MemoryEntryInput,
  NativeEngineLoader,
  NativeVectorEngine,
  SearchQuery,
  SearchResult,
  VectorBackend,
} from "./memory/types.js";

export { createLlmClient } from "./llm/client.js";
export { withRetry, type RetryOptions } from "./llm/retry.js";
export { createChatMemory, type ChatMemory, type ChatMemoryDeps } from "./memory-core.js";
