import type { TransportKind } from "../config/types.js";
import type { BridgeError } from "../errors/index.js";
import type { MessageKind } from "../messaging/types.js";
import type { ApiProviderName } from "./runtime.js";

export interface AskRequest {
  conversation: string;
  kind: MessageKind;
  model: string;
  prompt: string;
  /** Local file of a materialized image; required when `kind` is "image". */
  imagePath?: string;
  timeoutMs: number;
}

export type AskResult =
  | { ok: true; text: string; attempts: number }
  | { ok: false; error: BridgeError; attempts: number };

export interface ProviderAdapter {
  readonly providerId: string;
  readonly transport: TransportKind;
  ask(request: AskRequest): Promise<AskResult>;
}

export type ImageMediaType = "image/jpeg" | "image/png" | "image/gif" | "image/webp";

export interface ImagePayload {
  mediaType: ImageMediaType;
  base64: string;
}

export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  history: readonly ChatTurn[];
  prompt: string;
  image?: ImagePayload;
  maxTokens: number;
  temperature: number;
}

export interface ProviderClient {
  readonly provider: ApiProviderName;
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string>;
}
