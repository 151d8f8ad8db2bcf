import { z } from "zod";
import { ConfigError } from "../errors.js";
import { componentLogger, type Logger } from "../logger.js";
import { extractUserFacts } from "./facts.js";
import { IMPORTANT_SCORE, scoreMessage } from "./importance.js";
import { TokenEstimator } from "./tokens.js";
import type {
  HistoryStats,
  ImportanceScore,
  Message,
  Summarizer,
  Tokenizer,
  Transcript,
  UserFacts,
} from "./types.js";

// ── HistoryManager ───────────────────────────────────────

/** Discarded messages needed before a summary is worth requesting. */
const MIN_DISCARDED_FOR_SUMMARY = 10;

/** Cap on discarded messages handed to the summarizer. */
const SUMMARY_SOURCE_MESSAGES = 50;

const limitsSchema = z.object({
  keepRecent: z.number().int().nonnegative().default(200),
  maxHistory: z.number().int().positive().default(10_000),
  compressThreshold: z.number().int().nonnegative().default(2_000),
  maxTokens: z.number().int().positive().default(1_200_000),
  reserveTokens: z.number().int().nonnegative().default(2_000),
});

export type HistoryLimits = z.output<typeof limitsSchema>;

export interface HistoryManagerOptions extends Partial<HistoryLimits> {
  /** Enables summary entries in smartTrim. Without one, no slot is reserved. */
  summarizer?: Summarizer;
  /** Precise token counts. Without one, a chars/4 heuristic is used. */
  tokenizer?: Tokenizer;
  logger?: Logger;
}

export interface TrimOptions {
  /** Aborting it skips the summary; the trim itself still completes. */
  signal?: AbortSignal;
}

interface ScoredMessage {
  index: number;
  message: Message;
  score: number;
}

export class HistoryManager {
  readonly limits: Readonly<HistoryLimits>;
  private readonly summarizer: Summarizer | undefined;
  private readonly tokens: TokenEstimator;
  private readonly log: Logger;

  constructor(options: HistoryManagerOptions = {}) {
    const { summarizer, tokenizer, logger, ...limits } = options;
    const parsed = limitsSchema.safeParse(limits);
    if (!parsed.success) {
      throw new ConfigError(
        "Invalid history limits",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }

    this.limits = parsed.data;
    this.summarizer = summarizer;
    this.tokens = new TokenEstimator(tokenizer);
    this.log = logger ?? componentLogger("history");
  }

  get hasSummarizer(): boolean {
    return this.summarizer !== undefined;
  }

  // ── Scoring & estimation ───────────────────────────────

  scoreMessage(message: Message): ImportanceScore {
    return scoreMessage(message);
  }

  estimateTokens(transcript: Transcript): number {
    return this.tokens.estimate(transcript);
  }

  estimateMessageTokens(message: Message): number {
    return this.tokens.estimateMessage(message);
  }

  getStats(transcript: Transcript): HistoryStats {
    let userCount = 0;
    let importantCount = 0;
    for (const message of transcript) {
      if (message.role === "user") userCount++;
      if (scoreMessage(message).score >= IMPORTANT_SCORE) importantCount++;
    }

    return {
      total: transcript.length,
      userCount,
      aiCount: transcript.length - userCount,
      importantCount,
      estimatedTokens: this.estimateTokens(transcript),
    };
  }

  extractUserFacts(transcript: Transcript): UserFacts {
    return extractUserFacts(transcript);
  }

  /** True once the transcript is long enough that a trim is due. */
  needsCompression(transcript: Transcript): boolean {
    return transcript.length >= this.limits.compressThreshold;
  }

  // ── Count-based trim ───────────────────────────────────

  /**
   * Trim to at most `maxMessages` while keeping the recent tail verbatim
   * and the highest-scoring older messages in chronological order.
   * Discarded messages may be folded into one summary entry at the front.
   */
  async smartTrim(
    transcript: Transcript,
    maxMessages: number = this.limits.maxHistory,
    options: TrimOptions = {},
  ): Promise<Message[]> {
    if (transcript.length <= maxMessages) return [...transcript];

    this.log.info(
      { from: transcript.length, to: maxMessages },
      "📦 Smart trimming history",
    );

    // The protected tail never exceeds the budget on its own
    const recentCount = Math.min(this.limits.keepRecent, maxMessages);
    const splitAt = transcript.length - recentCount;
    const older = transcript.slice(0, splitAt);
    const recent = transcript.slice(splitAt);

    const ranked = rankByImportance(older);

    const availableSlots = maxMessages - recent.length;
    const summarySlots = this.summarizer && availableSlots > 0 ? 1 : 0;
    const messageSlots = Math.max(0, availableSlots - summarySlots);

    const keep = new Set(ranked.slice(0, messageSlots).map((s) => s.index));
    const keptOlder = older.filter((_, i) => keep.has(i));
    const discarded = older.filter((_, i) => !keep.has(i));

    let summary: Message | null = null;
    if (summarySlots > 0 && discarded.length >= MIN_DISCARDED_FOR_SUMMARY) {
      summary = await this.summarizeDiscarded(discarded, options.signal);
    }

    const result: Message[] = summary ? [summary] : [];
    result.push(...keptOlder, ...recent);

    this.log.info(
      {
        total: result.length,
        important: keptOlder.length,
        recent: recent.length,
        summary: summary !== null,
      },
      "📦 History trimmed",
    );

    return result;
  }

  private async summarizeDiscarded(
    discarded: Message[],
    signal?: AbortSignal,
  ): Promise<Message | null> {
    if (!this.summarizer) return null;

    try {
      signal?.throwIfAborted();
      const text = await this.summarizer.summarize(
        discarded,
        SUMMARY_SOURCE_MESSAGES,
        signal,
      );
      if (!text) return null;

      this.log.info(
        { discarded: discarded.length },
        "📝 Created summary from discarded messages",
      );
      return {
        role: "user",
        parts: [`[📝 สรุปบทสนทนาก่อนหน้า (${discarded.length} messages)]\n${text}`],
      };
    } catch (err) {
      this.log.warn({ err }, "⚠️ Failed to create summary");
      return null;
    }
  }

  // ── Token-budget trim ──────────────────────────────────

  /**
   * Evict the lowest-scoring unprotected message, one at a time, until the
   * estimate fits `maxTokens - reserveTokens`. The most recent
   * `min(keepRecent, length / 2)` messages are never evicted.
   */
  async smartTrimByTokens(
    transcript: Transcript,
    maxTokens: number = this.limits.maxTokens,
    reserveTokens: number = this.limits.reserveTokens,
  ): Promise<Message[]> {
    const target = maxTokens - reserveTokens;
    const messageTokens = transcript.map((m) => this.estimateMessageTokens(m));
    let total = sum(messageTokens);

    if (total <= target) return [...transcript];

    this.log.info({ from: total, to: target }, "📊 Token trim needed");

    const protectedCount = Math.min(
      this.limits.keepRecent,
      Math.floor(transcript.length / 2),
    );
    const trimEnd = transcript.length - protectedCount;

    // Scores are pure, so evicting in ascending (stable) order is the same
    // as rescoring the remainder after every removal. Reversed so pop()
    // yields the lowest score, earliest message first on ties.
    const evictionOrder = scoreAll(transcript.slice(0, trimEnd))
      .sort((a, b) => a.score - b.score)
      .reverse();
    const removed = new Set<number>();

    while (total > target) {
      const next = evictionOrder.pop();
      if (!next) {
        this.log.warn(
          { tokens: total, target, protectedCount },
          "⚠️ Cannot trim further without losing recent context",
        );
        break;
      }

      removed.add(next.index);
      total -= messageTokens[next.index] ?? 0;
      this.log.debug(
        { index: next.index, importance: next.score, tokens: messageTokens[next.index] },
        "Removed message",
      );
    }

    const result = transcript.filter((_, i) => !removed.has(i));
    this.log.info(
      { from: transcript.length, to: result.length, tokens: total },
      "📦 Token trim complete",
    );
    return result;
  }

  // ── Quick trim ─────────────────────────────────────────

  /** Synchronous head + tail slice. No scoring, no summary. */
  quickTrim(
    transcript: Transcript,
    maxMessages: number = this.limits.maxHistory,
  ): Message[] {
    if (transcript.length <= maxMessages) return [...transcript];

    const keepStart = Math.floor(maxMessages / 10);
    const keepEnd = maxMessages - keepStart;
    const tail = keepEnd > 0 ? transcript.slice(-keepEnd) : [];

    return [...transcript.slice(0, keepStart), ...tail];
  }
}

// ── Helpers ──────────────────────────────────────────────

/**
 * Highest score first. Array.prototype.sort is stable, so equal scores
 * keep chronological order; trims depend on that for determinism.
 */
function rankByImportance(messages: Transcript): ScoredMessage[] {
  return scoreAll(messages).sort((a, b) => b.score - a.score);
}

function scoreAll(messages: Transcript): ScoredMessage[] {
  return messages.map((message, index) => ({
    index,
    message,
    score: scoreMessage(message).score,
  }));
}

function sum(values: number[]): number {
  return values.reduce((s, v) => s + v, 0);
}
