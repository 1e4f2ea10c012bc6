export type MessageKind = "text" | "image";

/**
 * One inbound item read from the messaging surface. `content` holds the text
 * for text messages and the surface's image reference for images.
 */
export interface Message {
  readonly id: string;
  readonly conversation: string;
  readonly sender: string;
  readonly kind: MessageKind;
  readonly content: string;
  readonly caption?: string;
  readonly arrivedAt: number;
  readonly fingerprint: string;
}

export interface MessageSource {
  pollNew(conversation: string, signal?: AbortSignal): AsyncIterable<Message>;
  reply(conversation: string, text: string): Promise<void>;
  /** Saves an image message locally and returns the file path. */
  materializeImage(message: Message, signal?: AbortSignal): Promise<string>;
  /** Periodic housekeeping such as deleting stale images. */
  maintain(): Promise<void>;
}

export type SurfaceStatus = "ready" | "awaiting-login" | "unavailable";

export interface ChatRow {
  id: string;
  direction: "in" | "out";
  sender: string;
  kind: MessageKind;
  text: string;
  imageRef?: string;
  /** Raw `[HH:MM, D/M/YYYY] Name:` prefix when the surface exposes one. */
  meta?: string;
}

/** Rows read in one pass together with the title of the chat they belong to. */
export interface ChatView {
  /** Header title of the open chat, null when no chat is open. */
  title: string | null;
  rows: ChatRow[];
}

/**
 * Low-level operations on a chat web client. Implementations drive a
 * browser tab; tests use an in-memory fake.
 */
export interface ChatSurface {
  status(): Promise<SurfaceStatus>;
  /** Starts opening a chat; the pane may still show the previous one when this resolves. */
  selectChat(conversation: string): Promise<boolean>;
  activeChat(): Promise<string | null>;
  readRows(limit: number): Promise<ChatView>;
  sendText(text: string): Promise<void>;
  fetchImage(imageRef: string): Promise<string>;
}
