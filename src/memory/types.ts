// ── Memory Module: Shared Types ──────────────────────────

export interface MemoryEntry {
  /** Caller-assigned key; re-adding an id overwrites the entry */
  id: string;
  text: string;
  embedding: number[];
  /** Epoch seconds */
  timestamp: number;
  /** Score multiplier, caller-supplied (default 1.0) */
  importance: number;
}

/** Shape accepted by addBatch: timestamp and importance may be omitted. */
export type MemoryEntryInput = Omit<MemoryEntry, "timestamp" | "importance"> &
  Partial<Pick<MemoryEntry, "timestamp" | "importance">>;

export interface SearchResult {
  id: string;
  text: string;
  score: number;
  timestamp: number;
}

export interface SearchQuery {
  embedding: number[];
  topK: number;
  /** 0 disables decay entirely; > 0 applies exp(-factor * ageHours) */
  timeDecayFactor: number;
  /** Epoch seconds used for age computation */
  now: number;
}

/**
 * Storage and search behind VectorMemoryIndex. Chosen once at construction;
 * the index never branches on which implementation is active.
 */
export interface VectorBackend {
  readonly kind: "native" | "fallback";
  readonly size: number;
  add(entry: MemoryEntry): void;
  remove(id: string): boolean;
  get(id: string): MemoryEntry | undefined;
  search(query: SearchQuery): SearchResult[];
  clear(): void;
  ids(): string[];
  entries(): MemoryEntry[];
}

/**
 * What an accelerated engine must expose to back the index. Loaded by the
 * caller (e.g. from an optional add-on) and handed in through a loader.
 */
export interface NativeVectorEngine {
  add(entry: MemoryEntry): void;
  remove(id: string): boolean;
  get(id: string): MemoryEntry | undefined;
  search(
    query: number[],
    topK: number,
    timeDecayFactor: number,
    now: number,
  ): SearchResult[];
  len(): number;
  clear(): void;
  getIds(): string[];
  entries(): MemoryEntry[];
}

/** Returns null (or throws) when the accelerated engine is unavailable. */
export type NativeEngineLoader = (
  dimension: number,
  similarityThreshold: number,
) => NativeVectorEngine | null;
