import type { ApiConversationMapping, BridgeSettings } from "../config/types.js";
import { BridgeError, asBridgeError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";
import { withTimeout, type Clock } from "../shared/clock.js";
import { loadImagePayload } from "./image-payload.js";
import type { ProviderCredentials } from "./runtime.js";
import type { AskRequest, AskResult, ChatTurn, CompletionRequest, ImagePayload, ProviderAdapter, ProviderClient } from "./types.js";

export type ApiAdapterSettings = Pick<
  BridgeSettings,
  "apiMaxAttempts" | "apiBackoffBaseMs" | "apiBackoffMaxMs" | "maxImageBytes"
>;

export interface ApiAdapterOptions {
  providerId: string;
  mapping: ApiConversationMapping;
  client: ProviderClient;
  credentials: ProviderCredentials;
  clock: Clock;
  settings: ApiAdapterSettings;
  logger: BridgeLogger;
}

export function backoffDelayMs(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
}

export class ApiAdapter implements ProviderAdapter {
  public readonly transport = "api";
  public readonly providerId: string;
  private readonly mapping: ApiConversationMapping;
  private readonly client: ProviderClient;
  private readonly credentials: ProviderCredentials;
  private readonly clock: Clock;
  private readonly settings: ApiAdapterSettings;
  private readonly logger: BridgeLogger;
  private readonly history = new Map<string, ChatTurn[]>();

  public constructor(options: ApiAdapterOptions) {
    this.providerId = options.providerId;
    this.mapping = options.mapping;
    this.client = options.client;
    this.credentials = options.credentials;
    this.clock = options.clock;
    this.settings = options.settings;
    this.logger = options.logger;
  }

  public async ask(request: AskRequest): Promise<AskResult> {
    if (!request.prompt.trim()) {
      return { ok: false, attempts: 0, error: this.malformed("Prompt is empty") };
    }

    let image: ImagePayload | undefined;
    if (request.kind === "image") {
      if (!request.imagePath) {
        return { ok: false, attempts: 0, error: this.malformed("Image request without a materialized image") };
      }
      try {
        image = await loadImagePayload(request.imagePath, this.settings.maxImageBytes);
      } catch (error) {
        return { ok: false, attempts: 0, error: asBridgeError(error, { code: "TRANSPORT", providerId: this.providerId }) };
      }
    }

    const completion: CompletionRequest = {
      model: request.model,
      systemPrompt: this.mapping.systemPrompt,
      history: this.history.get(request.conversation) ?? [],
      prompt: request.prompt,
      image,
      maxTokens: this.credentials.maxTokens,
      temperature: this.credentials.temperature,
    };

    const deadline = this.clock.now() + request.timeoutMs;
    const maxAttempts = Math.max(1, this.settings.apiMaxAttempts);
    let lastError = new BridgeError({
      code: "TRANSPORT",
      providerId: this.providerId,
      message: `${this.providerId} request budget of ${request.timeoutMs}ms exhausted`,
    });

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) return { ok: false, attempts: attempt - 1, error: lastError };

      const controller = new AbortController();
      try {
        const raw = await withTimeout(
          this.client.complete(completion, controller.signal),
          remaining,
          `${this.providerId} completion`,
        );
        const text = raw.trim();
        this.remember(request.conversation, request.prompt, text);
        return { ok: true, text, attempts: attempt };
      } catch (error) {
        controller.abort();
        lastError = asBridgeError(error, { code: "TRANSPORT", providerId: this.providerId });
        if (!lastError.retryable || attempt === maxAttempts) {
          return { ok: false, attempts: attempt, error: lastError };
        }
        const delay =
          lastError.retryAfterMs ?? backoffDelayMs(attempt, this.settings.apiBackoffBaseMs, this.settings.apiBackoffMaxMs);
        if (this.clock.now() + delay >= deadline) {
          return { ok: false, attempts: attempt, error: lastError };
        }
        this.logger.warn(
          `${this.providerId} attempt ${attempt}/${maxAttempts} failed (${lastError.message}), retrying in ${delay}ms`,
        );
        await this.clock.sleep(delay);
      }
    }
    return { ok: false, attempts: maxAttempts, error: lastError };
  }

  private remember(conversation: string, prompt: string, reply: string): void {
    const limit = this.mapping.historyTurns * 2;
    if (limit <= 0) return;
    const turns = [...(this.history.get(conversation) ?? [])];
    turns.push({ role: "user", content: prompt }, { role: "assistant", content: reply });
    this.history.set(conversation, turns.slice(-limit));
  }

  private malformed(message: string): BridgeError {
    return new BridgeError({ code: "MALFORMED_INPUT", providerId: this.providerId, message });
  }
}
