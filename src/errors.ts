// ── Error Types ──────────────────────────────────────────
// Contract violations surface as these. Degradations (summarizer down,
// nothing left to trim) are logged instead and never thrown.

/** Invalid configuration: environment or constructor options. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

/** Two vectors (or a vector and the index) disagree on length. */
export class DimensionMismatchError extends Error {
  constructor(
    readonly expected: number,
    readonly actual: number,
    context = "Vector dimension mismatch",
  ) {
    super(`${context}: expected ${expected}, got ${actual}`);
    this.name = "DimensionMismatchError";
  }
}

/** A snapshot file parsed as JSON but is not a memory snapshot. */
export class SnapshotFormatError extends Error {
  constructor(
    readonly path: string,
    detail: string,
  ) {
    super(`Invalid memory snapshot ${path}: ${detail}`);
    this.name = "SnapshotFormatError";
  }
}
