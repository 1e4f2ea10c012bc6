import { createHash } from "node:crypto";
import type { MessageKind } from "../messaging/types.js";

export const DEFAULT_FINGERPRINT_GRANULARITY_MS = 60_000;

export interface FingerprintInput {
  conversation: string;
  kind: MessageKind;
  content: string;
  arrivedAt: number;
}

export function normalizeContent(content: string): string {
  return String(content || "").replace(/\s+/g, " ").trim().toLowerCase();
}

export function truncateTimestamp(timestampMs: number, granularityMs = DEFAULT_FINGERPRINT_GRANULARITY_MS): number {
  const step = Math.max(1, Math.floor(granularityMs));
  return Math.floor(timestampMs / step) * step;
}

export function computeFingerprint(
  input: FingerprintInput,
  granularityMs = DEFAULT_FINGERPRINT_GRANULARITY_MS,
): string {
  return createHash("sha256")
    .update(
      [
        input.conversation,
        input.kind,
        normalizeContent(input.content),
        String(truncateTimestamp(input.arrivedAt, granularityMs)),
      ].join("\u0000"),
    )
    .digest("hex");
}
