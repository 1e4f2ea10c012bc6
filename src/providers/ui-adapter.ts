import type { BridgeSettings, UiConversationMapping } from "../config/types.js";
import { BridgeError, describeUnknownError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";
import type { AuthProbeTarget } from "../session/probes.js";
import { withTimeout, type Clock } from "../shared/clock.js";
import { cleanResponseText } from "./response-text.js";
import { waitForStableText, type ResponseSnapshot } from "./stabilize.js";
import type { AskRequest, AskResult, ProviderAdapter } from "./types.js";

/**
 * One provider's chat page. The browser implementation lives in
 * `browser/provider-surface.ts`; tests script a fake.
 */
export interface ProviderSurface extends AuthProbeTarget {
  readonly supportsImages: boolean;
  paste(text: string): Promise<void>;
  submit(): Promise<void>;
  upload(filePath: string): Promise<void>;
  /** Latest response block only, never the whole transcript. */
  readLatest(): Promise<ResponseSnapshot>;
  reload(): Promise<void>;
}

export type UiAdapterSettings = Pick<
  BridgeSettings,
  "uploadDelayMs" | "responseWaitTextMs" | "responseWaitImageMs" | "pollIntervalMs"
>;

export interface UiAdapterOptions {
  providerId: string;
  mapping: UiConversationMapping;
  surface: ProviderSurface;
  clock: Clock;
  settings: UiAdapterSettings;
  logger: BridgeLogger;
}

const EMPTY_SNAPSHOT: ResponseSnapshot = { turns: 0, text: "" };

export class UiAdapter implements ProviderAdapter {
  public readonly transport = "ui";
  public readonly providerId: string;
  private readonly mapping: UiConversationMapping;
  private readonly surface: ProviderSurface;
  private readonly clock: Clock;
  private readonly settings: UiAdapterSettings;
  private readonly logger: BridgeLogger;

  public constructor(options: UiAdapterOptions) {
    this.providerId = options.providerId;
    this.mapping = options.mapping;
    this.surface = options.surface;
    this.clock = options.clock;
    this.settings = options.settings;
    this.logger = options.logger;
  }

  public async ask(request: AskRequest): Promise<AskResult> {
    const invalid = this.validate(request);
    if (invalid) return { ok: false, error: invalid, attempts: 0 };

    const waits = this.mapping.waits;
    const startedAt = this.clock.now();
    const deadline = startedAt + request.timeoutMs;
    let baseline = EMPTY_SNAPSHOT;

    try {
      if (request.kind === "image" && request.imagePath) {
        const imagePath = request.imagePath;
        await this.bounded(() => this.surface.upload(imagePath), deadline, "Image upload");
        const settle = waits.uploadDelayMs ?? this.settings.uploadDelayMs;
        await this.clock.sleep(Math.min(settle, Math.max(0, deadline - this.clock.now())));
      }
      baseline = await this.bounded(() => this.surface.readLatest(), deadline, "Baseline read").catch(
        () => EMPTY_SNAPSHOT,
      );
      if (request.prompt.trim()) await this.bounded(() => this.surface.paste(request.prompt), deadline, "Paste");
      await this.bounded(() => this.surface.submit(), deadline, "Submit");
    } catch (error) {
      return {
        ok: false,
        attempts: 1,
        error: new BridgeError({
          code: "TRANSPORT",
          retryable: true,
          providerId: this.providerId,
          message: `Could not submit prompt to ${this.providerId}: ${describeUnknownError(error)}`,
          cause: error,
        }),
      };
    }

    const initialWaitMs =
      request.kind === "image"
        ? (waits.responseWaitImageMs ?? this.settings.responseWaitImageMs)
        : (waits.responseWaitTextMs ?? this.settings.responseWaitTextMs);
    const outcome = await waitForStableText({
      read: () => this.surface.readLatest(),
      baseline,
      clock: this.clock,
      timeoutMs: Math.max(0, deadline - this.clock.now()),
      pollIntervalMs: this.settings.pollIntervalMs,
      initialWaitMs,
    });

    if (outcome.phase === "timed-out") {
      return {
        ok: false,
        attempts: 1,
        error: new BridgeError({
          code: "EXTRACTION_TIMEOUT",
          providerId: this.providerId,
          message: `No stable response from ${this.providerId} within ${request.timeoutMs}ms (${outcome.polls} polls)`,
        }),
      };
    }

    this.logger.debug(`${this.providerId} answered after ${outcome.polls} polls in ${this.clock.now() - startedAt}ms`);
    if (this.mapping.reloadAfterResponse) {
      await this.surface.reload().catch((error: unknown) => {
        this.logger.warn(`Reload of ${this.providerId} failed: ${describeUnknownError(error)}`);
      });
    }
    return { ok: true, text: cleanResponseText(outcome.text) || outcome.text, attempts: 1 };
  }

  // Surface calls share the request deadline; an expired budget fails fast.
  private bounded<T>(task: () => Promise<T>, deadline: number, label: string): Promise<T> {
    const remaining = deadline - this.clock.now();
    if (remaining <= 0) {
      return Promise.reject(new Error(`${label} started after the ${this.providerId} deadline`));
    }
    return withTimeout(task(), remaining, label);
  }

  private validate(request: AskRequest): BridgeError | null {
    if (!request.prompt.trim() && request.kind === "text") {
      return new BridgeError({ code: "MALFORMED_INPUT", providerId: this.providerId, message: "Prompt is empty" });
    }
    if (request.kind === "image") {
      if (!request.imagePath) {
        return new BridgeError({
          code: "MALFORMED_INPUT",
          providerId: this.providerId,
          message: "Image request without a materialized image",
        });
      }
      if (!this.surface.supportsImages) {
        return new BridgeError({
          code: "MALFORMED_INPUT",
          providerId: this.providerId,
          message: `${this.providerId} has no upload selector configured`,
        });
      }
    }
    return null;
  }
}
