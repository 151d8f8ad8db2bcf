import { readFileSync, writeFileSync } from "fs";
import { z } from "zod";
import { SnapshotFormatError } from "../errors.js";
import type { MemoryEntry } from "./types.js";

// ── Snapshot I/O ─────────────────────────────────────────
// Written: { version: 1, entries: [...] }.
// Read: that, or the older bare array of entries.

export const SNAPSHOT_VERSION = 1;

const entrySchema = z.object({
  id: z.string(),
  text: z.string(),
  embedding: z.array(z.number()),
  timestamp: z.number().optional(),
  importance: z.number().optional(),
});

const versionedSchema = z.object({
  version: z.number().int(),
  entries: z.array(entrySchema),
});

const snapshotSchema = z.union([z.array(entrySchema), versionedSchema]);

export interface MemorySnapshot {
  version: typeof SNAPSHOT_VERSION;
  entries: MemoryEntry[];
}

export function writeSnapshot(path: string, entries: MemoryEntry[]): void {
  const snapshot: MemorySnapshot = { version: SNAPSHOT_VERSION, entries };
  writeFileSync(path, JSON.stringify(snapshot, null, 2), "utf-8");
}

/**
 * Read and validate a snapshot. Malformed JSON throws SyntaxError; a valid
 * JSON document of the wrong shape throws SnapshotFormatError.
 * `now` fills in timestamps missing from legacy entries.
 */
export function readSnapshot(path: string, now: number): MemoryEntry[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SnapshotFormatError(
      path,
      issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unrecognised shape",
    );
  }

  const data = parsed.data;
  if (!Array.isArray(data) && data.version !== SNAPSHOT_VERSION) {
    throw new SnapshotFormatError(path, `unsupported version ${data.version}`);
  }

  const entries = Array.isArray(data) ? data : data.entries;
  return entries.map((e) => ({
    id: e.id,
    text: e.text,
    embedding: e.embedding,
    timestamp: e.timestamp ?? now,
    importance: e.importance ?? 1.0,
  }));
}
