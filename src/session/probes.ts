import type { ChatSurface } from "../messaging/types.js";
import type { ProviderCredentials } from "../providers/runtime.js";
import type { SessionProbe } from "./types.js";

export type AuthMarker = "authenticated" | "login" | "unknown";

export interface AuthProbeTarget {
  probeAuth(): Promise<AuthMarker>;
}

// A login form on a tab that used to be signed in means the login lapsed.
export function createUiProbe(target: AuthProbeTarget): SessionProbe {
  return async (previous) => {
    const marker = await target.probeAuth();
    if (marker === "authenticated") return "Ready";
    if (marker === "login" && (previous.state === "Ready" || previous.state === "Expired")) return "Expired";
    return "AwaitingLogin";
  };
}

/**
 * API sessions are ready when a key is present. An auth rejection keeps the
 * session expired for the rest of the process since the key cannot change.
 */
export function createApiProbe(credentials: Pick<ProviderCredentials, "apiKey">): SessionProbe {
  return async (previous) => {
    if (!credentials.apiKey.trim()) return "LoggedOut";
    if (previous.state === "Expired") return "Expired";
    return "Ready";
  };
}

export function createMessagingProbe(surface: Pick<ChatSurface, "status">): SessionProbe {
  return async (previous) => {
    const status = await surface.status();
    if (status === "ready") return "Ready";
    if (status === "awaiting-login") return previous.state === "Ready" ? "Expired" : "AwaitingLogin";
    return "LoggedOut";
  };
}
