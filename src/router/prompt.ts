import type { TransportKind } from "../config/types.js";

export const MESSAGE_PLACEHOLDER = "{message}";

export const DEFAULT_MAX_PROMPT_CHARS: Record<TransportKind, number> = {
  ui: 4_000,
  api: 16_000,
};

export function renderTemplate(template: string, message: string): string {
  return template.split(MESSAGE_PLACEHOLDER).join(message);
}

export function truncatePrompt(prompt: string, maxChars: number): string {
  const chars = Array.from(prompt);
  if (chars.length <= maxChars) return prompt;
  return chars.slice(0, Math.max(0, maxChars - 3)).join("").trimEnd() + "...";
}
