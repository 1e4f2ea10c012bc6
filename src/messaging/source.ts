import { computeFingerprint, DEFAULT_FINGERPRINT_GRANULARITY_MS } from "../cache/fingerprint.js";
import { asBridgeError, BridgeError, describeUnknownError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";
import { withTimeout, type Clock } from "../shared/clock.js";
import type { ImageStore } from "./media.js";
import { parseRowMeta } from "./timestamp.js";
import type { ChatRow, ChatSurface, Message, MessageSource } from "./types.js";

const DEFAULT_ROW_WINDOW = 20;
const FIRST_SEEN_RETENTION_MS = 24 * 60 * 60 * 1000;
const CHAT_SWITCH_CHECKS = 5;
const CHAT_SWITCH_POLL_MS = 200;

export interface BrowserMessageSourceOptions {
  surface: ChatSurface;
  images: ImageStore;
  clock: Clock;
  logger: BridgeLogger;
  ignore?: readonly string[];
  granularityMs?: number;
  materializeTimeoutMs: number;
  rowWindow?: number;
}

export class BrowserMessageSource implements MessageSource {
  private readonly surface: ChatSurface;
  private readonly images: ImageStore;
  private readonly clock: Clock;
  private readonly logger: BridgeLogger;
  private readonly ignore: ReadonlySet<string>;
  private readonly granularityMs: number;
  private readonly materializeTimeoutMs: number;
  private readonly rowWindow: number;
  private readonly watermarks = new Map<string, string>();
  private readonly firstSeen = new Map<string, number>();

  public constructor(options: BrowserMessageSourceOptions) {
    this.surface = options.surface;
    this.images = options.images;
    this.clock = options.clock;
    this.logger = options.logger;
    this.ignore = new Set((options.ignore ?? []).map((name) => name.trim()).filter(Boolean));
    this.granularityMs = options.granularityMs ?? DEFAULT_FINGERPRINT_GRANULARITY_MS;
    this.materializeTimeoutMs = options.materializeTimeoutMs;
    this.rowWindow = options.rowWindow ?? DEFAULT_ROW_WINDOW;
  }

  /**
   * Yields inbound rows newer than the watermark, oldest first. The watermark
   * moves past a row only when the consumer asks for the next one, so a
   * consumer that stops early sees the same row again on the next poll.
   * The first poll of a conversation only considers its latest inbound row.
   */
  public async *pollNew(conversation: string, signal?: AbortSignal): AsyncGenerator<Message> {
    if (this.ignore.has(conversation)) return;

    let rows: ChatRow[];
    try {
      if (!(await this.openChat(conversation))) return;
      const view = await this.surface.readRows(this.rowWindow);
      // Rows of another chat would be answered under this conversation's name.
      if (view.title !== conversation) {
        this.logger.debug(`Pane shows ${view.title ?? "no chat"} instead of ${conversation}, skipping this poll`);
        return;
      }
      rows = view.rows;
    } catch (error) {
      this.logger.warn(`Reading ${conversation} failed, skipping this poll: ${describeUnknownError(error)}`);
      return;
    }

    const incoming = rows.filter((row) => row.direction === "in" && !this.ignore.has(row.sender));
    for (const row of this.pending(conversation, incoming)) {
      if (signal?.aborted) return;
      yield this.toMessage(conversation, row);
      this.watermarks.set(conversation, row.id);
    }
  }

  public async reply(conversation: string, text: string): Promise<void> {
    if (!(await this.openChat(conversation))) {
      throw new BridgeError({ code: "TRANSPORT", message: `Conversation ${conversation} could not be opened for reply` });
    }
    await this.surface.sendText(text);
  }

  public async materializeImage(message: Message): Promise<string> {
    if (message.kind !== "image" || !message.content) {
      throw new BridgeError({ code: "MALFORMED_INPUT", message: "Message carries no image" });
    }
    try {
      const dataUrl = await withTimeout(
        this.surface.fetchImage(message.content),
        this.materializeTimeoutMs,
        "Image download",
      );
      return await this.images.save(dataUrl, message.conversation);
    } catch (error) {
      throw asBridgeError(error, { code: "TRANSPORT" });
    }
  }

  public async maintain(): Promise<void> {
    const removed = await this.images.cleanup();
    if (removed > 0) this.logger.info(`Removed ${removed} stale images`);
    const cutoff = this.clock.now() - FIRST_SEEN_RETENTION_MS;
    for (const [id, seenAt] of this.firstSeen) {
      if (seenAt < cutoff) this.firstSeen.delete(id);
    }
  }

  /** Selects the chat and waits, bounded, until its header is the one shown. */
  private async openChat(conversation: string): Promise<boolean> {
    if (!(await this.surface.selectChat(conversation))) {
      this.logger.debug(`Conversation ${conversation} is not on the chat list`);
      return false;
    }
    for (let check = 1; check <= CHAT_SWITCH_CHECKS; check += 1) {
      if ((await this.surface.activeChat()) === conversation) return true;
      if (check < CHAT_SWITCH_CHECKS) await this.clock.sleep(CHAT_SWITCH_POLL_MS);
    }
    this.logger.debug(`Chat pane did not switch to ${conversation}`);
    return false;
  }

  private pending(conversation: string, incoming: ChatRow[]): ChatRow[] {
    const watermark = this.watermarks.get(conversation);
    if (watermark === undefined) return incoming.slice(-1);
    const index = incoming.findIndex((row) => row.id === watermark);
    // A watermark that scrolled out of the window means every visible row is newer.
    return index >= 0 ? incoming.slice(index + 1) : incoming;
  }

  private toMessage(conversation: string, row: ChatRow): Message {
    const meta = parseRowMeta(row.meta);
    const key = `${conversation}\u0000${row.id}`;
    let arrivedAt = meta.arrivedAt;
    if (arrivedAt === null) {
      arrivedAt = this.firstSeen.get(key) ?? this.clock.now();
      this.firstSeen.set(key, arrivedAt);
    }
    const kind = row.kind;
    const content = kind === "image" ? (row.imageRef ?? "") : row.text;
    return {
      id: row.id,
      conversation,
      sender: row.sender || meta.sender,
      kind,
      content,
      ...(kind === "image" && row.text ? { caption: row.text } : {}),
      arrivedAt,
      // Blob URLs change on every page load; the row id does not.
      fingerprint: computeFingerprint(
        { conversation, kind, content: kind === "image" ? row.id : content, arrivedAt },
        this.granularityMs,
      ),
    };
  }
}
