import type { BrowserTab } from "../browser/driver.js";
import { pasteTextScript } from "../browser/scripts.js";
import type { ChatRow, ChatSurface, ChatView, SurfaceStatus } from "./types.js";

const COMPOSE_SELECTOR = "footer div[contenteditable='true']";

const ACTIVE_TITLE_EXPR = `(() => {
    const header = document.querySelector("#main header");
    if (!header) return null;
    const el = header.querySelector("span[title]") || header.querySelector("span[dir='auto']");
    return el ? (el.getAttribute("title") || el.textContent || "").trim() : null;
  })()`;

const ACTIVE_CHAT_SCRIPT = ACTIVE_TITLE_EXPR;

const STATUS_SCRIPT = `(() => {
  if (document.querySelector("div[data-testid='qrcode'], canvas[aria-label*='Scan']")) return "awaiting-login";
  if (document.querySelector("#pane-side, div[role='listitem']")) return "ready";
  return "unavailable";
})()`;

function selectChatScript(conversation: string): string {
  return `(() => {
  const name = ${JSON.stringify(conversation)};
  const titles = Array.from(document.querySelectorAll("div[role='listitem'] span[title]"));
  const match = titles.find((el) => el.getAttribute("title") === name);
  if (!match) return false;
  const target = match.closest("div[role='listitem']") || match;
  for (const type of ["mousedown", "mouseup", "click"]) {
    target.dispatchEvent(new MouseEvent(type, { bubbles: true, cancelable: true, view: window }));
  }
  return true;
})()`;
}

function readRowsScript(limit: number): string {
  return `(() => {
  const title = ${ACTIVE_TITLE_EXPR};
  const rows = Array.from(document.querySelectorAll("#main div.message-in, #main div.message-out")).slice(-${Math.max(1, limit)});
  return { title, rows: rows.map((row, index) => {
    const holder = row.closest("[data-id]");
    const copyable = row.querySelector("[data-pre-plain-text]");
    const textEl = row.querySelector("span.selectable-text");
    const image = row.querySelector("img[src^='blob:'], img[src^='data:image']");
    return {
      id: holder ? holder.getAttribute("data-id") : "",
      direction: row.classList.contains("message-out") ? "out" : "in",
      meta: copyable ? copyable.getAttribute("data-pre-plain-text") : "",
      text: textEl ? String(textEl.innerText || "") : "",
      imageRef: image ? image.getAttribute("src") : "",
      index,
    };
  }) };
})()`;
}

function fetchImageScript(imageRef: string): string {
  return `(async () => {
  const ref = ${JSON.stringify(imageRef)};
  if (ref.startsWith("data:")) return ref;
  const blob = await fetch(ref).then((res) => res.blob());
  return await new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => resolve(String(reader.result || ""));
    reader.onerror = () => reject(reader.error);
    reader.readAsDataURL(blob);
  });
})()`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** Narrows the row script's view; a missing or empty title reads as no open chat. */
export function toChatView(value: unknown): ChatView {
  if (!isRecord(value)) return { title: null, rows: [] };
  const title = str(value.title).trim();
  return { title: title || null, rows: toChatRows(value.rows) };
}

/** Narrows the row script's output; rows without content are dropped. */
export function toChatRows(value: unknown): ChatRow[] {
  if (!Array.isArray(value)) return [];
  const rows: ChatRow[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const text = str(item.text).trim();
    const imageRef = str(item.imageRef);
    if (!text && !imageRef) continue;
    const meta = str(item.meta);
    const senderMatch = /\]\s*(.*?):\s*$/.exec(meta);
    rows.push({
      id: str(item.id) || `${meta}|${text || imageRef}`,
      direction: item.direction === "out" ? "out" : "in",
      sender: senderMatch?.[1]?.trim() ?? "",
      kind: imageRef ? "image" : "text",
      text,
      ...(imageRef ? { imageRef } : {}),
      ...(meta ? { meta } : {}),
    });
  }
  return rows;
}

export class WhatsAppWebSurface implements ChatSurface {
  public constructor(
    private readonly tab: BrowserTab,
    private readonly url: string,
  ) {}

  public async open(): Promise<void> {
    await this.tab.open(this.url);
  }

  public async status(): Promise<SurfaceStatus> {
    const value = await this.tab.evaluate(STATUS_SCRIPT);
    return value === "ready" || value === "awaiting-login" ? value : "unavailable";
  }

  public async selectChat(conversation: string): Promise<boolean> {
    return (await this.tab.evaluate(selectChatScript(conversation))) === true;
  }

  public async activeChat(): Promise<string | null> {
    const value = await this.tab.evaluate(ACTIVE_CHAT_SCRIPT);
    return typeof value === "string" && value.trim() ? value.trim() : null;
  }

  public async readRows(limit: number): Promise<ChatView> {
    return toChatView(await this.tab.evaluate(readRowsScript(limit)));
  }

  public async sendText(text: string): Promise<void> {
    await this.tab.evaluate(pasteTextScript(COMPOSE_SELECTOR, text));
    await this.tab.press("Enter");
  }

  public async fetchImage(imageRef: string): Promise<string> {
    const value = await this.tab.evaluate(fetchImageScript(imageRef));
    if (typeof value !== "string" || !value.startsWith("data:")) {
      throw new Error("image could not be read from the page");
    }
    return value;
  }
}
