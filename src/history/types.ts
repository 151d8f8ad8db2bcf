// ── History Module: Shared Types ─────────────────────────

/** A fragment of message text: bare string or a `{ text }` wrapper. */
export type MessagePart = string | { text: string };

export type MessageRole = "user" | "model";

export interface Message {
  role: MessageRole;
  parts?: readonly MessagePart[];
}

/** Ordered conversation, oldest first. Never mutated by trim operations. */
export type Transcript = readonly Message[];

export interface ImportanceScore {
  score: number;
  /** Names of the importance rules the message matched, in table order. */
  matched: string[];
}

export interface HistoryStats {
  total: number;
  userCount: number;
  aiCount: number;
  /** Messages scoring at or above the "important" threshold. */
  importantCount: number;
  estimatedTokens: number;
}

export interface UserFacts {
  names: string[];
  preferences: string[];
  personal_info: string[];
  rules: string[];
}

/**
 * Condenses discarded messages into one text block.
 * Returns null (or "") when there is nothing worth keeping. May throw;
 * the history manager treats a failure as "no summary".
 */
export interface Summarizer {
  summarize(
    messages: Transcript,
    maxMessages: number,
    signal?: AbortSignal,
  ): Promise<string | null>;
}

/** Precise tokenizer, e.g. a BPE encoder. Only the token count is used. */
export interface Tokenizer {
  encode(text: string): ArrayLike<number>;
}
