import { z } from "zod";
import { ConfigError, DimensionMismatchError } from "../errors.js";
import { componentLogger, type Logger } from "../logger.js";
import { FallbackBackend } from "./fallback-backend.js";
import { NativeBackend } from "./native-backend.js";
import { readSnapshot, writeSnapshot } from "./snapshot.js";
import type {
  MemoryEntry,
  MemoryEntryInput,
  NativeEngineLoader,
  SearchResult,
  VectorBackend,
} from "./types.js";

// ── VectorMemoryIndex ────────────────────────────────────

const settingsSchema = z.object({
  dimension: z.number().int().positive().default(384),
  similarityThreshold: z.number().min(-1).max(1).default(0.7),
});

export interface VectorMemoryIndexOptions {
  dimension?: number;
  similarityThreshold?: number;
  /** Feature probe for an accelerated engine; fallback scan when absent */
  native?: NativeEngineLoader;
  /** Epoch seconds. Defaults to wall-clock time. */
  clock?: () => number;
  logger?: Logger;
}

export class VectorMemoryIndex {
  readonly dimension: number;
  readonly similarityThreshold: number;
  private readonly backend: VectorBackend;
  private readonly clock: () => number;
  private readonly log: Logger;

  constructor(options: VectorMemoryIndexOptions = {}) {
    const parsed = settingsSchema.safeParse({
      dimension: options.dimension,
      similarityThreshold: options.similarityThreshold,
    });
    if (!parsed.success) {
      throw new ConfigError(
        "Invalid vector index settings",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }

    this.dimension = parsed.data.dimension;
    this.similarityThreshold = parsed.data.similarityThreshold;
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.log = options.logger ?? componentLogger("vector-index");
    this.backend = this.selectBackend(options.native);
  }

  private selectBackend(loader?: NativeEngineLoader): VectorBackend {
    if (loader) {
      try {
        const engine = loader(this.dimension, this.similarityThreshold);
        if (engine) {
          this.log.info("✅ Native vector engine loaded");
          return new NativeBackend(engine);
        }
      } catch (err) {
        this.log.warn({ err }, "⚠️ Native vector engine failed to load");
      }
      this.log.warn("⚠️ Native vector engine not available, using fallback scan");
    }
    return new FallbackBackend(this.similarityThreshold);
  }

  get isNative(): boolean {
    return this.backend.kind === "native";
  }

  get size(): number {
    return this.backend.size;
  }

  // ── Writes ─────────────────────────────────────────────

  add(
    id: string,
    text: string,
    embedding: number[],
    timestamp?: number,
    importance = 1.0,
  ): void {
    this.assertDimension(embedding, `Embedding for "${id}"`);
    this.backend.add({
      id,
      text,
      embedding: [...embedding],
      timestamp: timestamp ?? this.clock(),
      importance,
    });
  }

  /** Validates the whole batch before inserting any of it. */
  addBatch(entries: readonly MemoryEntryInput[]): number {
    for (const e of entries) this.assertDimension(e.embedding, `Embedding for "${e.id}"`);
    for (const e of entries) {
      this.add(e.id, e.text, e.embedding, e.timestamp, e.importance ?? 1.0);
    }
    return entries.length;
  }

  remove(id: string): boolean {
    return this.backend.remove(id);
  }

  clear(): void {
    this.backend.clear();
  }

  // ── Reads ──────────────────────────────────────────────

  /** A copy; mutating it does not touch the stored entry. */
  get(id: string): MemoryEntry | undefined {
    const entry = this.backend.get(id);
    return entry && { ...entry, embedding: [...entry.embedding] };
  }

  getIds(): string[] {
    return this.backend.ids();
  }

  /**
   * Top-k entries by cosine similarity × importance, optionally decayed by
   * age. Entries scoring below the similarity threshold are dropped.
   */
  search(queryEmbedding: number[], topK = 5, timeDecayFactor = 0.0): SearchResult[] {
    this.assertDimension(queryEmbedding, "Query embedding");
    return this.backend.search({
      embedding: queryEmbedding,
      topK,
      timeDecayFactor,
      now: this.clock(),
    });
  }

  // ── Persistence ────────────────────────────────────────

  save(path: string): void {
    writeSnapshot(path, this.backend.entries());
    this.log.debug({ path, entries: this.size }, "💾 Vector memory saved");
  }

  /**
   * Merge a snapshot into the index: ids in the file overwrite, everything
   * else stays. Returns the number of entries read from the file.
   */
  load(path: string): number {
    const entries = readSnapshot(path, this.clock());
    for (const e of entries) this.assertDimension(e.embedding, `Snapshot entry "${e.id}"`);
    for (const e of entries) this.backend.add(e);

    this.log.info({ path, entries: entries.length }, "📦 Vector memory loaded");
    return entries.length;
  }

  private assertDimension(embedding: readonly number[], context: string): void {
    if (embedding.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, embedding.length, context);
    }
  }
}
