import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ConfigError, DimensionMismatchError, SnapshotFormatError } from "../src/errors.js";
import { FallbackBackend } from "../src/memory/fallback-backend.js";
import type { MemoryEntry, NativeVectorEngine, SearchResult } from "../src/memory/types.js";
import { VectorMemoryIndex } from "../src/memory/vector-index.js";

const NOW = 1_700_000_000;
const clock = () => NOW;

function makeIndex(similarityThreshold = 0.5): VectorMemoryIndex {
  return new VectorMemoryIndex({ dimension: 3, similarityThreshold, clock });
}

describe("VectorMemoryIndex", () => {
  // ── Construction ───────────────────────────────────────

  it("uses the fallback backend by default", () => {
    const index = makeIndex();
    expect(index.isNative).toBe(false);
    expect(index.size).toBe(0);
  });

  it("rejects invalid settings", () => {
    expect(() => new VectorMemoryIndex({ dimension: 0 })).toThrow(ConfigError);
    expect(() => new VectorMemoryIndex({ similarityThreshold: 1.5 })).toThrow(ConfigError);
  });

  // ── Writes ─────────────────────────────────────────────

  it("overwrites entries that share an id", () => {
    const index = makeIndex();
    index.add("a", "first", [1, 0, 0]);
    index.add("a", "second", [0, 1, 0], 42, 2);

    expect(index.size).toBe(1);
    expect(index.get("a")).toEqual({
      id: "a",
      text: "second",
      embedding: [0, 1, 0],
      timestamp: 42,
      importance: 2,
    });
  });

  it("defaults timestamp to the clock and importance to 1", () => {
    const index = makeIndex();
    index.add("a", "text", [1, 0, 0]);
    expect(index.get("a")).toMatchObject({ timestamp: NOW, importance: 1 });
  });

  it("hands out copies that cannot corrupt the stored embedding", () => {
    const index = makeIndex();
    index.add("a", "text", [1, 0, 0]);
    index.get("a")?.embedding.push(9);

    expect(index.get("a")?.embedding).toEqual([1, 0, 0]);
    expect(index.search([1, 0, 0]).map((r) => r.id)).toEqual(["a"]);
  });

  it("removes entries and reports whether one existed", () => {
    const index = makeIndex();
    index.add("a", "text", [1, 0, 0]);
    expect(index.remove("a")).toBe(true);
    expect(index.remove("a")).toBe(false);
    expect(index.size).toBe(0);
  });

  it("adds batches and returns the processed count", () => {
    const index = makeIndex();
    const count = index.addBatch([
      { id: "a", text: "one", embedding: [1, 0, 0] },
      { id: "b", text: "two", embedding: [0, 1, 0], timestamp: 5, importance: 3 },
      { id: "a", text: "three", embedding: [0, 0, 1] },
    ]);

    expect(count).toBe(3);
    expect(index.getIds()).toEqual(["a", "b"]);
    expect(index.get("a")?.text).toBe("three");
    expect(index.get("b")).toMatchObject({ timestamp: 5, importance: 3 });
  });

  it("inserts nothing from a batch containing a bad embedding", () => {
    const index = makeIndex();
    expect(() =>
      index.addBatch([
        { id: "a", text: "one", embedding: [1, 0, 0] },
        { id: "b", text: "two", embedding: [1, 0] },
      ]),
    ).toThrow(DimensionMismatchError);
    expect(index.size).toBe(0);
  });

  it("rejects embeddings of the wrong dimension", () => {
    const index = makeIndex();
    expect(() => index.add("a", "text", [1, 0])).toThrow(DimensionMismatchError);
    expect(() => index.search([1, 0, 0, 0])).toThrow(DimensionMismatchError);
  });

  it("clears all entries", () => {
    const index = makeIndex();
    index.add("a", "text", [1, 0, 0]);
    index.add("b", "text", [0, 1, 0]);
    index.clear();
    expect(index.size).toBe(0);
    expect(index.getIds()).toEqual([]);
  });

  // ── Search ─────────────────────────────────────────────

  it("returns nothing from an empty index", () => {
    expect(makeIndex().search([1, 0, 0])).toEqual([]);
  });

  it("filters by threshold and orders by descending score", () => {
    const index = makeIndex(0.5);
    index.add("a", "exact", [1, 0, 0]);
    index.add("b", "orthogonal", [0, 1, 0]);
    index.add("c", "close", [0.9, 0.1, 0]);

    const results = index.search([1, 0, 0], 2);

    expect(results.map((r) => r.id)).toEqual(["a", "c"]);
    expect(results[0]).toEqual({ id: "a", text: "exact", score: 1, timestamp: NOW });
    expect(results[1]?.score).toBeCloseTo(0.9 / Math.sqrt(0.82), 12);
  });

  it("limits results to topK", () => {
    const index = makeIndex(0.1);
    index.add("a", "one", [1, 0, 0]);
    index.add("b", "two", [0.9, 0.1, 0]);
    index.add("c", "three", [0.8, 0.2, 0]);

    expect(index.search([1, 0, 0], 1).map((r) => r.id)).toEqual(["a"]);
  });

  it("multiplies similarity by importance", () => {
    const index = makeIndex(0.7);
    index.add("low", "low", [1, 0, 0], NOW, 0.5);
    index.add("high", "high", [0.9, 0.1, 0], NOW, 2);

    const results = index.search([1, 0, 0]);

    expect(results.map((r) => r.id)).toEqual(["high"]);
    expect(results[0]?.score).toBeCloseTo((2 * 0.9) / Math.sqrt(0.82), 12);
  });

  it("applies time decay only when the factor is positive", () => {
    const index = makeIndex(0.7);
    index.add("hour-old", "text", [1, 0, 0], NOW - 3600);

    expect(index.search([1, 0, 0], 5, 0)[0]?.score).toBe(1);
    expect(index.search([1, 0, 0], 5, 0.1)[0]?.score).toBeCloseTo(Math.exp(-0.1), 12);
    expect(index.search([1, 0, 0], 5, 1)).toEqual([]);
  });

  // ── Persistence ────────────────────────────────────────

  describe("persistence", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "vector-index-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("round-trips entries through a versioned snapshot", () => {
      const path = join(dir, "memory.json");
      const source = makeIndex();
      source.add("a", "ข้อความ", [1, 0, 0], 100, 1.5);
      source.add("b", "second", [0, 1, 0], 200);
      source.save(path);

      const restored = makeIndex();
      expect(restored.load(path)).toBe(2);
      expect(new Set(restored.getIds())).toEqual(new Set(["a", "b"]));
      expect(restored.get("a")).toEqual(source.get("a"));
      expect(restored.get("b")).toEqual(source.get("b"));

      expect(JSON.parse(readFileSync(path, "utf-8"))).toMatchObject({ version: 1 });
    });

    it("merges into existing entries instead of replacing them", () => {
      const path = join(dir, "memory.json");
      const source = makeIndex();
      source.add("a", "from file", [1, 0, 0]);
      source.save(path);

      const target = makeIndex();
      target.add("a", "stale", [0, 1, 0]);
      target.add("z", "untouched", [0, 0, 1]);

      expect(target.load(path)).toBe(1);
      expect(target.getIds().sort()).toEqual(["a", "z"]);
      expect(target.get("a")?.text).toBe("from file");
      expect(target.get("z")?.text).toBe("untouched");
    });

    it("reads legacy bare-array snapshots", () => {
      const path = join(dir, "legacy.json");
      writeFileSync(
        path,
        JSON.stringify([{ id: "old", text: "legacy", embedding: [0, 0, 1] }]),
        "utf-8",
      );

      const index = makeIndex();
      expect(index.load(path)).toBe(1);
      expect(index.get("old")).toEqual({
        id: "old",
        text: "legacy",
        embedding: [0, 0, 1],
        timestamp: NOW,
        importance: 1,
      });
    });

    it("throws SyntaxError on malformed JSON", () => {
      const path = join(dir, "broken.json");
      writeFileSync(path, "{ not json", "utf-8");
      expect(() => makeIndex().load(path)).toThrow(SyntaxError);
    });

    it("throws SnapshotFormatError on the wrong shape or version", () => {
      const wrongShape = join(dir, "shape.json");
      const wrongVersion = join(dir, "version.json");
      writeFileSync(wrongShape, JSON.stringify({ foo: 1 }), "utf-8");
      writeFileSync(wrongVersion, JSON.stringify({ version: 2, entries: [] }), "utf-8");

      expect(() => makeIndex().load(wrongShape)).toThrow(SnapshotFormatError);
      expect(() => makeIndex().load(wrongVersion)).toThrow(SnapshotFormatError);
    });

    it("merges nothing when a snapshot entry has the wrong dimension", () => {
      const path = join(dir, "mismatch.json");
      writeFileSync(
        path,
        JSON.stringify({
          version: 1,
          entries: [
            { id: "ok", text: "fine", embedding: [1, 0, 0], timestamp: 1, importance: 1 },
            { id: "bad", text: "short", embedding: [1, 0], timestamp: 1, importance: 1 },
          ],
        }),
        "utf-8",
      );

      const index = makeIndex();
      expect(() => index.load(path)).toThrow(DimensionMismatchError);
      expect(index.size).toBe(0);
    });

    it("propagates file-system errors", () => {
      const index = makeIndex();
      expect(() => index.save(join(dir, "missing", "memory.json"))).toThrow(/ENOENT/);
      expect(() => index.load(join(dir, "absent.json"))).toThrow(/ENOENT/);
    });
  });

  // ── Native backend ─────────────────────────────────────

  describe("native backend", () => {
    /** Stands in for an accelerated engine; reuses the fallback scan. */
    class FakeEngine implements NativeVectorEngine {
      private readonly inner: FallbackBackend;
      readonly searches: Array<[number[], number, number, number]> = [];

      constructor(threshold: number) {
        this.inner = new FallbackBackend(threshold);
      }

      add(entry: MemoryEntry): void {
        this.inner.add(entry);
      }
      remove(id: string): boolean {
        return this.inner.remove(id);
      }
      get(id: string): MemoryEntry | undefined {
        return this.inner.get(id);
      }
      search(query: number[], topK: number, decay: number, now: number): SearchResult[] {
        this.searches.push([query, topK, decay, now]);
        return this.inner.search({ embedding: query, topK, timeDecayFactor: decay, now });
      }
      len(): number {
        return this.inner.size;
      }
      clear(): void {
        this.inner.clear();
      }
      getIds(): string[] {
        return this.inner.ids();
      }
      entries(): MemoryEntry[] {
        return this.inner.entries();
      }
    }

    it("delegates to the engine the loader returns", () => {
      const engines: FakeEngine[] = [];
      const loader = vi.fn((_dimension: number, threshold: number) => {
        const engine = new FakeEngine(threshold);
        engines.push(engine);
        return engine;
      });

      const index = new VectorMemoryIndex({
        dimension: 3,
        similarityThreshold: 0.5,
        native: loader,
        clock,
      });
      index.add("a", "text", [1, 0, 0]);

      expect(index.isNative).toBe(true);
      expect(loader).toHaveBeenCalledWith(3, 0.5);
      expect(index.size).toBe(1);
      expect(index.search([1, 0, 0], 3, 0.2).map((r) => r.id)).toEqual(["a"]);
      expect(engines[0]?.searches).toEqual([[[1, 0, 0], 3, 0.2, NOW]]);
    });

    it("falls back when the loader returns null", () => {
      const index = new VectorMemoryIndex({ dimension: 3, native: () => null });
      expect(index.isNative).toBe(false);
    });

    it("falls back when the loader throws", () => {
      const index = new VectorMemoryIndex({
        dimension: 3,
        native: () => {
          throw new Error("add-on not built");
        },
      });
      expect(index.isNative).toBe(false);
    });
  });
});
