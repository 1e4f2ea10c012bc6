import type { BridgeErrorCode } from "../errors/index.js";

export type DispatchState =
  | "Detected"
  | "Deduped"
  | "Dispatched"
  | "AwaitingResponse"
  | "Extracted"
  | "Delivered"
  | "Cached"
  | "Skipped"
  | "Failed";

export type DispatchStatus = "delivered" | "failed" | "skipped";

export interface DispatchResult {
  status: DispatchStatus;
  conversation: string;
  fingerprint: string;
  responseText?: string;
  reason?: string;
  errorCode?: BridgeErrorCode;
  /** True when the message was left unmarked and will be seen again. */
  willRetry: boolean;
  trail: DispatchState[];
}
