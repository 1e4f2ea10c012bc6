import type { UiConversationMapping } from "../config/types.js";
import type { ResponseSnapshot } from "../providers/stabilize.js";
import type { ProviderSurface } from "../providers/ui-adapter.js";
import type { AuthMarker } from "../session/probes.js";
import type { BrowserTab } from "./driver.js";
import { authMarkerScript, latestBlockScript, pasteTextScript } from "./scripts.js";

function toSnapshot(value: unknown): ResponseSnapshot {
  if (!value || typeof value !== "object") return { turns: 0, text: "" };
  const turns = "turns" in value && typeof value.turns === "number" ? value.turns : 0;
  const text = "text" in value && typeof value.text === "string" ? value.text : "";
  return { turns, text };
}

function toAuthMarker(value: unknown): AuthMarker {
  return value === "authenticated" || value === "login" ? value : "unknown";
}

/**
 * Provider chat page behind a browser tab, addressed through the mapping's
 * selectors.
 */
export class BrowserProviderSurface implements ProviderSurface {
  private readonly selectors: UiConversationMapping["selectors"];

  public constructor(
    private readonly tab: BrowserTab,
    private readonly mapping: Pick<UiConversationMapping, "url" | "selectors">,
  ) {
    this.selectors = mapping.selectors;
  }

  public get supportsImages(): boolean {
    return Boolean(this.selectors.upload);
  }

  public async open(): Promise<void> {
    await this.tab.open(this.mapping.url);
  }

  public async probeAuth(): Promise<AuthMarker> {
    return toAuthMarker(await this.tab.evaluate(authMarkerScript(this.selectors.authenticated, this.selectors.login)));
  }

  public async paste(text: string): Promise<void> {
    await this.tab.evaluate(pasteTextScript(this.selectors.input, text));
  }

  public async submit(): Promise<void> {
    if (this.selectors.submit) {
      await this.tab.click(this.selectors.submit);
      return;
    }
    await this.tab.click(this.selectors.input);
    await this.tab.press("Enter");
  }

  public async upload(filePath: string): Promise<void> {
    if (!this.selectors.upload) throw new Error("no upload selector configured");
    await this.tab.upload(this.selectors.upload, filePath);
  }

  public async readLatest(): Promise<ResponseSnapshot> {
    return toSnapshot(await this.tab.evaluate(latestBlockScript(this.selectors.response)));
  }

  public async reload(): Promise<void> {
    await this.tab.reload();
  }
}
