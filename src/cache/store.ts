import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { describeUnknownError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";

export type RetentionPolicy =
  | { kind: "unbounded" }
  | { kind: "window"; maxAgeMs?: number; maxEntries?: number };

export interface CacheEntry {
  fingerprint: string;
  processedAt: number;
}

export interface CacheStoreOptions {
  file: string;
  logger: BridgeLogger;
  retention?: RetentionPolicy;
  now?: () => number;
}

interface CacheDocument {
  version: 1;
  entries: Record<string, number>;
  updatedAt: string;
}

// Flat `{ key: seconds }` maps from older installs store seconds.
const SECONDS_CUTOFF = 1e12;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readEntries(value: Record<string, unknown>, legacy: boolean): Map<string, number> {
  const entries = new Map<string, number>();
  for (const [fingerprint, processedAt] of Object.entries(value)) {
    if (typeof processedAt !== "number" || !Number.isFinite(processedAt)) continue;
    entries.set(
      fingerprint,
      legacy && processedAt < SECONDS_CUTOFF ? Math.round(processedAt * 1000) : processedAt,
    );
  }
  return entries;
}

function parseDocument(raw: string): Map<string, number> {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) throw new Error("cache document is not an object");
  if (parsed.version === 1) {
    if (!isRecord(parsed.entries)) throw new Error("cache document has no entries map");
    return readEntries(parsed.entries, false);
  }
  return readEntries(parsed, true);
}

/**
 * Persisted set of processed-message fingerprints. Every `mark` rewrites the
 * whole file through a temp file and rename, so readers never see a partial
 * document.
 */
export class CacheStore {
  private readonly file: string;
  private readonly logger: BridgeLogger;
  private readonly retention: RetentionPolicy;
  private readonly now: () => number;
  private entries = new Map<string, number>();

  public constructor(options: CacheStoreOptions) {
    this.file = path.resolve(options.file);
    this.logger = options.logger;
    this.retention = options.retention ?? { kind: "unbounded" };
    this.now = options.now ?? Date.now;
  }

  public get size(): number {
    return this.entries.size;
  }

  public load(): void {
    if (!fs.existsSync(this.file)) {
      this.entries = new Map();
      this.logger.info(`Cache file ${this.file} not found, starting empty`);
      return;
    }
    try {
      this.entries = parseDocument(fs.readFileSync(this.file, "utf8"));
      this.logger.info(`Loaded ${this.entries.size} cache entries from ${this.file}`);
    } catch (error) {
      this.entries = new Map();
      this.logger.warn(`Cache file ${this.file} is unreadable, starting empty: ${describeUnknownError(error)}`);
    }
  }

  public seen(fingerprint: string): boolean {
    return this.entries.has(fingerprint);
  }

  public get(fingerprint: string): CacheEntry | null {
    const processedAt = this.entries.get(fingerprint);
    return processedAt === undefined ? null : { fingerprint, processedAt };
  }

  public mark(fingerprint: string, processedAt: number = this.now()): void {
    this.entries.set(fingerprint, processedAt);
    this.applyRetention();
    this.flush();
  }

  public flush(): void {
    const document: CacheDocument = {
      version: 1,
      entries: Object.fromEntries(this.entries),
      updatedAt: new Date(this.now()).toISOString(),
    };
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    const tmp = `${this.file}.${process.pid}.${randomBytes(8).toString("hex")}.tmp`;
    try {
      fs.writeFileSync(tmp, JSON.stringify(document), "utf8");
      fs.renameSync(tmp, this.file);
    } catch (error) {
      fs.rmSync(tmp, { force: true });
      throw error;
    }
  }

  private applyRetention(): void {
    if (this.retention.kind === "unbounded") return;
    const { maxAgeMs, maxEntries } = this.retention;
    if (maxAgeMs !== undefined) {
      const cutoff = this.now() - maxAgeMs;
      for (const [fingerprint, processedAt] of this.entries) {
        if (processedAt < cutoff) this.entries.delete(fingerprint);
      }
    }
    if (maxEntries !== undefined && this.entries.size > maxEntries) {
      const ordered = [...this.entries.entries()].sort((a, b) => a[1] - b[1]);
      for (const [fingerprint] of ordered.slice(0, ordered.length - maxEntries)) {
        this.entries.delete(fingerprint);
      }
    }
  }
}
