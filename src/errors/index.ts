export type BridgeErrorCode =
  | "CONFIGURATION"
  | "SESSION_NOT_READY"
  | "EXTRACTION_TIMEOUT"
  | "TRANSPORT"
  | "MALFORMED_INPUT"
  | "AUTH_FAILED";

export interface BridgeErrorOptions {
  code: BridgeErrorCode;
  message: string;
  retryable?: boolean;
  statusCode?: number;
  retryAfterMs?: number;
  providerId?: string;
  cause?: unknown;
}

const DEFAULT_RETRYABLE: Record<BridgeErrorCode, boolean> = {
  CONFIGURATION: false,
  SESSION_NOT_READY: true,
  EXTRACTION_TIMEOUT: true,
  TRANSPORT: true,
  MALFORMED_INPUT: false,
  AUTH_FAILED: false,
};

export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly retryable: boolean;
  public readonly statusCode?: number;
  public readonly retryAfterMs?: number;
  public readonly providerId?: string;

  constructor(options: BridgeErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "BridgeError";
    this.code = options.code;
    this.retryable = options.retryable ?? DEFAULT_RETRYABLE[options.code];
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
    this.providerId = options.providerId;
  }
}

export class ConfigurationError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super({ code: "CONFIGURATION", message, cause });
    this.name = "ConfigurationError";
  }
}

export function isBridgeError(value: unknown): value is BridgeError {
  return value instanceof BridgeError;
}

export function describeUnknownError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function asBridgeError(
  value: unknown,
  fallback: Omit<BridgeErrorOptions, "message"> & { message?: string } = { code: "TRANSPORT" },
): BridgeError {
  if (value instanceof BridgeError) return value;
  const message = value instanceof Error ? value.message : String(value ?? fallback.message ?? "Unknown error");
  return new BridgeError({ ...fallback, message, cause: value });
}

/**
 * Maps a provider HTTP status onto the bridge taxonomy. Rate limits and server
 * errors are transient, rejected payloads are malformed input and credential
 * rejections end the provider session.
 */
export function classifyHttpStatus(status: number): { code: BridgeErrorCode; retryable: boolean } {
  if (status === 401 || status === 403) return { code: "AUTH_FAILED", retryable: false };
  if (status === 400 || status === 413 || status === 422) return { code: "MALFORMED_INPUT", retryable: false };
  if (status === 408 || status === 429 || status >= 500) return { code: "TRANSPORT", retryable: true };
  return { code: "TRANSPORT", retryable: false };
}

export function parseRetryAfterMs(header: string | null | undefined): number | undefined {
  const raw = String(header ?? "").trim();
  if (!raw) return undefined;
  const seconds = Number(raw);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const at = Date.parse(raw);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - Date.now());
}
