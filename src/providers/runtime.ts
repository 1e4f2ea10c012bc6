export const API_PROVIDERS = ["openai", "claude", "gemini", "grok", "perplexity"] as const;

export type ApiProviderName = (typeof API_PROVIDERS)[number];

export interface ProviderCredentials {
  apiKey: string;
  baseURL: string;
  maxTokens: number;
  temperature: number;
}

interface ProviderDefaults {
  baseURL: string;
  textModel: string;
  visionModel: string;
  maxTokens: number;
  apiKeyEnv: readonly string[];
}

const PROVIDER_DEFAULTS: Record<ApiProviderName, ProviderDefaults> = {
  openai: {
    baseURL: "https://api.openai.com/v1",
    textModel: "gpt-4.1-mini",
    visionModel: "gpt-4.1-mini",
    maxTokens: 700,
    apiKeyEnv: ["OPENAI_API_KEY"],
  },
  claude: {
    baseURL: "https://api.anthropic.com",
    textModel: "claude-sonnet-4-20250514",
    visionModel: "claude-sonnet-4-20250514",
    maxTokens: 700,
    apiKeyEnv: ["ANTHROPIC_API_KEY", "CLAUDE_API_KEY"],
  },
  gemini: {
    baseURL: "https://generativelanguage.googleapis.com/v1beta/openai",
    textModel: "gemini-2.5-flash",
    visionModel: "gemini-2.5-flash",
    maxTokens: 700,
    apiKeyEnv: ["GEMINI_API_KEY"],
  },
  grok: {
    baseURL: "https://api.x.ai/v1",
    textModel: "grok-4-0709",
    visionModel: "grok-2-vision-1212",
    maxTokens: 700,
    apiKeyEnv: ["GROK_API_KEY", "XAI_API_KEY"],
  },
  perplexity: {
    baseURL: "https://api.perplexity.ai",
    textModel: "sonar",
    visionModel: "sonar",
    maxTokens: 2500,
    apiKeyEnv: ["PERPLEXITY_API_KEY"],
  },
};

const DEFAULT_TEMPERATURE = 0.7;

export function isApiProviderName(value: string): value is ApiProviderName {
  return (API_PROVIDERS as readonly string[]).includes(value);
}

export function defaultTextModel(provider: ApiProviderName): string {
  return PROVIDER_DEFAULTS[provider].textModel;
}

export function defaultVisionModel(provider: ApiProviderName): string {
  return PROVIDER_DEFAULTS[provider].visionModel;
}

export function toOpenAiLikeBase(baseURL: string, provider: ApiProviderName = "openai"): string {
  const trimmed = String(baseURL || "").trim().replace(/\/+$/, "");
  return trimmed || PROVIDER_DEFAULTS[provider].baseURL;
}

export function toClaudeBase(baseURL: string): string {
  const trimmed = String(baseURL || "").trim().replace(/\/+$/, "");
  if (!trimmed) return PROVIDER_DEFAULTS.claude.baseURL;
  return trimmed.replace(/\/v1$/i, "");
}

function readNumber(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (!raw || !raw.trim()) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, Math.min(max, parsed));
}

function resolveOne(provider: ApiProviderName, env: NodeJS.ProcessEnv): ProviderCredentials {
  const defaults = PROVIDER_DEFAULTS[provider];
  const prefix = provider.toUpperCase();
  const apiKey = defaults.apiKeyEnv.map((name) => String(env[name] ?? "").trim()).find(Boolean) ?? "";
  const baseOverride = env[`${prefix}_BASE_URL`] ?? "";
  return {
    apiKey,
    baseURL: provider === "claude" ? toClaudeBase(baseOverride) : toOpenAiLikeBase(baseOverride, provider),
    maxTokens: Math.floor(readNumber(env[`${prefix}_MAX_TOKENS`], defaults.maxTokens, 1, 1_000_000)),
    temperature: readNumber(env[`${prefix}_TEMPERATURE`], DEFAULT_TEMPERATURE, 0, 2),
  };
}

/**
 * Reads `<PROVIDER>_API_KEY`, `<PROVIDER>_MAX_TOKENS`, `<PROVIDER>_TEMPERATURE`
 * and `<PROVIDER>_BASE_URL` for every API provider. A missing key is not an
 * error here; the session registry reports that provider as logged out.
 */
export function resolveProviderCredentials(
  env: NodeJS.ProcessEnv = process.env,
): Record<ApiProviderName, ProviderCredentials> {
  return {
    openai: resolveOne("openai", env),
    claude: resolveOne("claude", env),
    gemini: resolveOne("gemini", env),
    grok: resolveOne("grok", env),
    perplexity: resolveOne("perplexity", env),
  };
}
