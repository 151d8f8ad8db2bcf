import { cosineSimilarity, timeDecay } from "./similarity.js";
import type {
  MemoryEntry,
  SearchQuery,
  SearchResult,
  VectorBackend,
} from "./types.js";

/**
 * Brute-force linear scan over an in-memory map. O(n·d) per query; meant
 * for working sets of hundreds to low thousands of entries.
 */
export class FallbackBackend implements VectorBackend {
  readonly kind = "fallback" as const;
  private readonly store = new Map<string, MemoryEntry>();

  constructor(private readonly similarityThreshold: number) {}

  get size(): number {
    return this.store.size;
  }

  add(entry: MemoryEntry): void {
    this.store.set(entry.id, entry);
  }

  remove(id: string): boolean {
    return this.store.delete(id);
  }

  get(id: string): MemoryEntry | undefined {
    const entry = this.store.get(id);
    return entry && copyEntry(entry);
  }

  search({ embedding, topK, timeDecayFactor, now }: SearchQuery): SearchResult[] {
    const results: SearchResult[] = [];

    for (const entry of this.store.values()) {
      const base = cosineSimilarity(embedding, entry.embedding);
      const score =
        timeDecayFactor > 0
          ? base * timeDecay(now - entry.timestamp, timeDecayFactor) * entry.importance
          : base * entry.importance;

      if (score >= this.similarityThreshold) {
        results.push({ id: entry.id, text: entry.text, score, timestamp: entry.timestamp });
      }
    }

    // Stable: equal scores keep insertion order
    results.sort((a, b) => b.score - a.score);
    return results.slice(0, Math.max(0, topK));
  }

  clear(): void {
    this.store.clear();
  }

  ids(): string[] {
    return [...this.store.keys()];
  }

  entries(): MemoryEntry[] {
    return [...this.store.values()].map(copyEntry);
  }
}

function copyEntry(entry: MemoryEntry): MemoryEntry {
  return { ...entry, embedding: [...entry.embedding] };
}
