export type SessionState = "LoggedOut" | "AwaitingLogin" | "Ready" | "Expired";

export interface ProviderSession {
  providerId: string;
  state: SessionState;
  lastCheckedAt: number;
  detail?: string;
}

/**
 * Transport-specific liveness check. Receives the session as last recorded
 * so a probe can keep `Expired` sticky or tell a logout from a first login.
 */
export type SessionProbe = (previous: ProviderSession) => Promise<SessionState>;

export const MESSAGING_SESSION_ID = "messaging";
