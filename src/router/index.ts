import type { ConversationMapping } from "../config/types.js";
import { BridgeError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";
import type { Message, MessageKind } from "../messaging/types.js";
import { DEFAULT_MAX_PROMPT_CHARS, renderTemplate, truncatePrompt } from "./prompt.js";

export interface RouteDecision {
  mapping: ConversationMapping;
  providerId: string;
  kind: MessageKind;
  model: string;
  prompt: string;
  timeoutMs: number;
}

export interface ChatRouterOptions {
  conversations: readonly ConversationMapping[];
  /** Used when a mapping sets no response timeout, and caps the ones it sets. */
  defaultTimeoutMs: number;
  logger: BridgeLogger;
}

export function providerIdFor(mapping: Pick<ConversationMapping, "transport" | "provider">): string {
  return `${mapping.transport}:${mapping.provider}`;
}

/**
 * Lookup from conversation name to its mapping. Names are case-sensitive and
 * the iteration order is the configuration order.
 */
export class ChatRouter {
  private readonly byName: ReadonlyMap<string, ConversationMapping>;
  private readonly defaultTimeoutMs: number;
  private readonly logger: BridgeLogger;

  public constructor(options: ChatRouterOptions) {
    this.byName = new Map(options.conversations.map((mapping) => [mapping.name, mapping]));
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.logger = options.logger;
  }

  public list(): ConversationMapping[] {
    return [...this.byName.values()];
  }

  public resolve(conversation: string): ConversationMapping | null {
    const mapping = this.byName.get(conversation) ?? null;
    if (!mapping) this.logger.debug(`No mapping for conversation ${conversation}`);
    return mapping;
  }

  public route(mapping: ConversationMapping, message: Message): RouteDecision {
    const timeoutMs = Math.min(mapping.waits.responseTimeoutMs ?? this.defaultTimeoutMs, this.defaultTimeoutMs);
    const maxChars = mapping.maxPromptChars ?? DEFAULT_MAX_PROMPT_CHARS[mapping.transport];
    if (message.kind === "image") {
      if (!message.content.trim()) {
        throw new BridgeError({ code: "MALFORMED_INPUT", message: "Image message has no image reference" });
      }
      return {
        mapping,
        providerId: providerIdFor(mapping),
        kind: "image",
        model: mapping.visionModel,
        prompt: truncatePrompt(renderTemplate(mapping.imagePromptTemplate, message.caption?.trim() ?? ""), maxChars),
        timeoutMs,
      };
    }
    const text = message.content.trim();
    if (!text) {
      throw new BridgeError({ code: "MALFORMED_INPUT", message: "Text message is empty" });
    }
    return {
      mapping,
      providerId: providerIdFor(mapping),
      kind: "text",
      model: mapping.textModel,
      prompt: truncatePrompt(renderTemplate(mapping.textPromptTemplate, text), maxChars),
      timeoutMs,
    };
  }
}
