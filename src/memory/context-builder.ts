import { sliceChars } from "../history/content.js";
import type { UserFacts } from "../history/types.js";
import type { SearchResult } from "./types.js";

// ── Context Builder ──────────────────────────────────────

export interface MemoryContext {
  /** Facts pulled from the transcript by extractUserFacts */
  facts: UserFacts;
  /** Recalled entries from VectorMemoryIndex.search */
  memories: SearchResult[];
}

const FACT_LABELS: ReadonlyArray<[keyof UserFacts, string]> = [
  ["names", "name"],
  ["preferences", "likes"],
  ["personal_info", "personal"],
  ["rules", "rule"],
];

const MAX_MEMORY_CHARS = 200;

/**
 * Builds the text block injected between the system prompt and the new
 * turn. Empty categories are skipped; returns "" when there is nothing.
 * `now` is epoch seconds, matching memory timestamps.
 */
export function buildMemoryContext(
  ctx: MemoryContext,
  now: number = Date.now() / 1000,
): string {
  const parts: string[] = [];

  const factLines: string[] = [];
  for (const [key, label] of FACT_LABELS) {
    for (const value of ctx.facts[key]) factLines.push(`• ${label}: ${value}`);
  }
  if (factLines.length > 0) {
    parts.push(`📋 KNOWN FACTS ABOUT THE USER:\n${factLines.join("\n")}`);
  }

  // Recalled memories, oldest → newest
  if (ctx.memories.length > 0) {
    const sorted = [...ctx.memories].sort((a, b) => a.timestamp - b.timestamp);
    const lines = sorted.map(
      (m) => `• [${formatAgo(now - m.timestamp)}] "${sliceChars(m.text, MAX_MEMORY_CHARS)}"`,
    );
    parts.push(`🧠 RELEVANT MEMORIES (retrieved semantically):\n${lines.join("\n")}`);
  }

  return parts.join("\n\n");
}

/** Format an age in seconds as "X ago". */
function formatAgo(ageSeconds: number): string {
  const diffSec = Math.floor(ageSeconds);
  if (diffSec < 60) return "just now";
  const diffMin = Math.floor(diffSec / 60);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  const diffDay = Math.floor(diffHr / 24);
  if (diffDay < 30) return `${diffDay}d ago`;
  const diffMo = Math.floor(diffDay / 30);
  return `${diffMo}mo ago`;
}
