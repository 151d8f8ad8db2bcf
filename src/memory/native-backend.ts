import type {
  MemoryEntry,
  NativeVectorEngine,
  SearchQuery,
  SearchResult,
  VectorBackend,
} from "./types.js";

/** Adapts an accelerated engine to the backend interface. */
export class NativeBackend implements VectorBackend {
  readonly kind = "native" as const;

  constructor(private readonly engine: NativeVectorEngine) {}

  get size(): number {
    return this.engine.len();
  }

  add(entry: MemoryEntry): void {
    this.engine.add(entry);
  }

  remove(id: string): boolean {
    return this.engine.remove(id);
  }

  get(id: string): MemoryEntry | undefined {
    return this.engine.get(id);
  }

  search(query: SearchQuery): SearchResult[] {
    return this.engine.search(
      query.embedding,
      query.topK,
      query.timeDecayFactor,
      query.now,
    );
  }

  clear(): void {
    this.engine.clear();
  }

  ids(): string[] {
    return this.engine.getIds();
  }

  entries(): MemoryEntry[] {
    return this.engine.entries();
  }
}
