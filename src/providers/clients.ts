import Anthropic from "@anthropic-ai/sdk";
import { BridgeError, classifyHttpStatus, describeUnknownError, parseRetryAfterMs } from "../errors/index.js";
import { toClaudeBase, toOpenAiLikeBase, type ApiProviderName, type ProviderCredentials } from "./runtime.js";
import type { ChatTurn, CompletionRequest, ProviderClient } from "./types.js";

type OpenAiContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

interface OpenAiChatMessage {
  role: "system" | "user" | "assistant";
  content: string | OpenAiContentPart[];
}

interface OpenAiChatCompletion {
  id?: string;
  choices?: Array<{ message?: { content?: unknown }; finish_reason?: string | null }>;
  error?: { message?: string };
}

function parseJsonSafe(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function toCompletion(value: unknown): OpenAiChatCompletion {
  if (!isRecord(value)) return {};
  const completion: OpenAiChatCompletion = {};
  if (Array.isArray(value.choices)) {
    completion.choices = value.choices.filter(isRecord).map((choice) => ({
      message: isRecord(choice.message) ? { content: choice.message.content } : undefined,
    }));
  }
  if (isRecord(value.error)) {
    completion.error = { message: typeof value.error.message === "string" ? value.error.message : undefined };
  }
  return completion;
}

export function extractOpenAiChatText(completion: OpenAiChatCompletion): string {
  const raw = completion.choices?.[0]?.message?.content;
  if (typeof raw === "string") return raw.trim();
  if (!Array.isArray(raw)) return "";
  return raw
    .map((part: unknown) => (isRecord(part) && part.type === "text" ? String(part.text ?? "") : ""))
    .join("\n")
    .trim();
}

function httpError(provider: ApiProviderName, status: number, detail: string, retryAfter?: string | null): BridgeError {
  const { code, retryable } = classifyHttpStatus(status);
  return new BridgeError({
    code,
    retryable,
    statusCode: status,
    retryAfterMs: parseRetryAfterMs(retryAfter),
    providerId: `api:${provider}`,
    message: `${provider} request failed (${status}): ${detail}`,
  });
}

function transportError(provider: ApiProviderName, error: unknown): BridgeError {
  return new BridgeError({
    code: "TRANSPORT",
    retryable: true,
    providerId: `api:${provider}`,
    message: `${provider} request failed: ${describeUnknownError(error)}`,
    cause: error,
  });
}

function emptyReply(provider: ApiProviderName): BridgeError {
  return new BridgeError({
    code: "TRANSPORT",
    retryable: true,
    providerId: `api:${provider}`,
    message: `${provider} returned an empty reply`,
  });
}

function toOpenAiMessages(request: CompletionRequest): OpenAiChatMessage[] {
  const messages: OpenAiChatMessage[] = [];
  if (request.systemPrompt.trim()) messages.push({ role: "system", content: request.systemPrompt });
  for (const turn of request.history) messages.push({ role: turn.role, content: turn.content });
  if (request.image) {
    messages.push({
      role: "user",
      content: [
        { type: "text", text: request.prompt },
        { type: "image_url", image_url: { url: `data:${request.image.mediaType};base64,${request.image.base64}` } },
      ],
    });
  } else {
    messages.push({ role: "user", content: request.prompt });
  }
  return messages;
}

/**
 * Chat-completions client for every provider that speaks the OpenAI wire
 * format (OpenAI, Gemini's compatibility endpoint, xAI, Perplexity).
 */
export function createOpenAiCompatibleClient(
  provider: ApiProviderName,
  credentials: ProviderCredentials,
  baseUrlOverride?: string,
): ProviderClient {
  const endpoint = `${toOpenAiLikeBase(baseUrlOverride ?? credentials.baseURL, provider)}/chat/completions`;
  return {
    provider,
    async complete(request, signal) {
      let res: Response;
      try {
        res = await fetch(endpoint, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            Authorization: `Bearer ${credentials.apiKey}`,
          },
          body: JSON.stringify({
            model: request.model,
            messages: toOpenAiMessages(request),
            max_tokens: request.maxTokens,
            temperature: request.temperature,
          }),
          signal,
        });
      } catch (error) {
        throw transportError(provider, error);
      }
      const text = await res.text().catch(() => "");
      const completion = toCompletion(parseJsonSafe(text));
      if (!res.ok) {
        throw httpError(provider, res.status, completion.error?.message || text || res.statusText, res.headers.get("retry-after"));
      }
      const reply = extractOpenAiChatText(completion);
      if (!reply) throw emptyReply(provider);
      return reply;
    },
  };
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) return headers.get(name) ?? undefined;
  if (!headers || typeof headers !== "object") return undefined;
  const entry = Object.entries(headers).find(([key]) => key.toLowerCase() === name);
  return typeof entry?.[1] === "string" ? entry[1] : undefined;
}

function toClaudeMessages(request: CompletionRequest): Anthropic.MessageParam[] {
  const messages: Anthropic.MessageParam[] = request.history.map((turn: ChatTurn) => ({
    role: turn.role,
    content: turn.content,
  }));
  if (request.image) {
    messages.push({
      role: "user",
      content: [
        {
          type: "image",
          source: { type: "base64", media_type: request.image.mediaType, data: request.image.base64 },
        },
        { type: "text", text: request.prompt },
      ],
    });
  } else {
    messages.push({ role: "user", content: request.prompt });
  }
  return messages;
}

export function createClaudeClient(credentials: ProviderCredentials, baseUrlOverride?: string): ProviderClient {
  const client = new Anthropic({
    apiKey: credentials.apiKey,
    baseURL: toClaudeBase(baseUrlOverride ?? credentials.baseURL),
    maxRetries: 0,
  });
  return {
    provider: "claude",
    async complete(request, signal) {
      let message: Anthropic.Messages.Message;
      try {
        message = await client.messages.create(
          {
            model: request.model,
            max_tokens: request.maxTokens,
            temperature: request.temperature,
            ...(request.systemPrompt.trim() ? { system: request.systemPrompt } : {}),
            messages: toClaudeMessages(request),
          },
          { signal },
        );
      } catch (error) {
        if (error instanceof Anthropic.APIError && typeof error.status === "number") {
          throw httpError("claude", error.status, error.message, readHeader(error.headers, "retry-after"));
        }
        throw transportError("claude", error);
      }
      const reply = message.content
        .flatMap((block) => (block.type === "text" ? [block.text] : []))
        .join("\n")
        .trim();
      if (!reply) throw emptyReply("claude");
      return reply;
    },
  };
}

export function createProviderClient(
  provider: ApiProviderName,
  credentials: ProviderCredentials,
  baseUrlOverride?: string,
): ProviderClient {
  if (provider === "claude") return createClaudeClient(credentials, baseUrlOverride);
  return createOpenAiCompatibleClient(provider, credentials, baseUrlOverride);
}
