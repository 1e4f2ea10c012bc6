import fs from "node:fs/promises";
import path from "node:path";
import { BridgeError } from "../errors/index.js";

const DATA_URL_RE = /^data:(image\/[a-z0-9.+-]+);base64,([a-z0-9+/=\s]+)$/i;

const EXTENSIONS: Record<string, string> = {
  "image/jpeg": "jpg",
  "image/jpg": "jpg",
  "image/png": "png",
  "image/gif": "gif",
  "image/webp": "webp",
};

export const DEFAULT_IMAGE_MAX_AGE_MS = 60 * 60 * 1000;

export interface ImageStoreOptions {
  dir: string;
  maxAgeMs?: number;
  now?: () => number;
}

function safePrefix(prefix: string): string {
  return prefix.replace(/[^a-z0-9_-]+/gi, "_").replace(/^_+|_+$/g, "").slice(0, 48) || "image";
}

/** Temporary on-disk home for images pulled from the chat surface. */
export class ImageStore {
  private readonly dir: string;
  private readonly maxAgeMs: number;
  private readonly now: () => number;
  private sequence = 0;

  public constructor(options: ImageStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_IMAGE_MAX_AGE_MS;
    this.now = options.now ?? Date.now;
  }

  public async save(dataUrl: string, prefix: string): Promise<string> {
    const match = DATA_URL_RE.exec(dataUrl.trim());
    const mimeType = match?.[1]?.toLowerCase() ?? "";
    const extension = EXTENSIONS[mimeType];
    if (!match || !extension) {
      throw new BridgeError({ code: "MALFORMED_INPUT", message: "Image is not a supported base64 data URL" });
    }
    const bytes = Buffer.from((match[2] ?? "").replace(/\s+/g, ""), "base64");
    if (bytes.length === 0) {
      throw new BridgeError({ code: "MALFORMED_INPUT", message: "Image data URL is empty" });
    }
    await fs.mkdir(this.dir, { recursive: true });
    this.sequence += 1;
    const file = path.join(this.dir, `${safePrefix(prefix)}_${this.now()}_${this.sequence}.${extension}`);
    await fs.writeFile(file, bytes);
    return file;
  }

  /** Deletes stored images older than the max age; returns how many. */
  public async cleanup(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return 0;
      throw error;
    }
    const cutoff = this.now() - this.maxAgeMs;
    let removed = 0;
    for (const name of names) {
      const file = path.join(this.dir, name);
      const stat = await fs.stat(file).catch(() => null);
      if (!stat?.isFile() || stat.mtimeMs >= cutoff) continue;
      await fs.rm(file, { force: true });
      removed += 1;
    }
    return removed;
  }
}
