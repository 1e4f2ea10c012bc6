import assert from "node:assert/strict";
import test from "node:test";

import { createSilentLogger } from "../logging/index.js";
import { createManualClock, createSystemClock } from "../shared/clock.js";
import type { ResponseSnapshot } from "./stabilize.js";
import { FakeProviderSurface } from "../testing/fakes.js";
import { TEST_SETTINGS, uiMapping } from "../testing/fixtures.js";
import { UiAdapter } from "./ui-adapter.js";

function makeAdapter(surface: FakeProviderSurface, reloadAfterResponse = false) {
  const clock = createManualClock(0);
  const adapter = new UiAdapter({
    providerId: "ui:chatgpt",
    mapping: uiMapping("Capivara", { reloadAfterResponse }),
    surface,
    clock,
    settings: TEST_SETTINGS,
    logger: createSilentLogger(),
  });
  return { adapter, clock };
}

test("text prompt is pasted, submitted and the stable reply returned", async () => {
  const surface = new FakeProviderSurface(["Hi", "Hi there", "Hi there"]);
  const { adapter, clock } = makeAdapter(surface, true);
  const result = await adapter.ask({
    conversation: "Capivara",
    kind: "text",
    model: "",
    prompt: "Hello",
    timeoutMs: 30_000,
  });
  assert.deepEqual(result, { ok: true, text: "Hi there", attempts: 1 });
  assert.deepEqual(surface.calls, ["paste:Hello", "submit", "reload"]);
  assert.equal(clock.now(), 4_000);
});

test("image prompt uploads first and waits for the upload to settle", async () => {
  const surface = new FakeProviderSurface(["A capybara", "A capybara"]);
  const { adapter, clock } = makeAdapter(surface);
  const result = await adapter.ask({
    conversation: "Capivara",
    kind: "image",
    model: "",
    prompt: "Describe this image briefly.",
    imagePath: "/tmp/capy.jpg",
    timeoutMs: 30_000,
  });
  assert.equal(result.ok, true);
  assert.deepEqual(surface.calls, ["upload:/tmp/capy.jpg", "paste:Describe this image briefly.", "submit"]);
  assert.deepEqual(clock.slept, [2_000, 5_000, 1_000]);
});

test("a response that never settles fails with an extraction timeout inside the bound", async () => {
  const texts = Array.from({ length: 100 }, (_, index) => `partial ${index}`);
  const surface = new FakeProviderSurface(texts);
  const { adapter, clock } = makeAdapter(surface);
  const result = await adapter.ask({ conversation: "Capivara", kind: "text", model: "", prompt: "Hello", timeoutMs: 30_000 });
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, "EXTRACTION_TIMEOUT");
    assert.equal(result.error.retryable, true);
  }
  assert.ok(clock.now() <= 30_000 + TEST_SETTINGS.pollIntervalMs);
});

test("submit failures are retryable transport errors", async () => {
  const surface = new FakeProviderSurface(["unused"]);
  surface.failSubmit = true;
  const { adapter } = makeAdapter(surface);
  const result = await adapter.ask({ conversation: "Capivara", kind: "text", model: "", prompt: "Hello", timeoutMs: 30_000 });
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, "TRANSPORT");
    assert.equal(result.error.retryable, true);
    assert.equal(result.error.message, "Could not submit prompt to ui:chatgpt: input not found");
  }
});

test("empty prompts and images without an upload target are malformed", async () => {
  const { adapter } = makeAdapter(new FakeProviderSurface(["x"]));
  const empty = await adapter.ask({ conversation: "Capivara", kind: "text", model: "", prompt: "  ", timeoutMs: 1_000 });
  assert.equal(empty.ok ? "ok" : empty.error.code, "MALFORMED_INPUT");

  const { adapter: textOnly } = makeAdapter(new FakeProviderSurface(["x"], false));
  const image = await textOnly.ask({
    conversation: "Capivara",
    kind: "image",
    model: "",
    prompt: "Describe",
    imagePath: "/tmp/a.png",
    timeoutMs: 1_000,
  });
  assert.equal(image.ok ? "ok" : image.error.code, "MALFORMED_INPUT");
});

class StallingSurface extends FakeProviderSurface {
  public stall: "paste" | "read" = "paste";
  private submitted = false;

  public override async paste(text: string): Promise<void> {
    if (this.stall === "paste") return new Promise<void>(() => {});
    return super.paste(text);
  }

  public override async submit(): Promise<void> {
    this.submitted = true;
    return super.submit();
  }

  public override async readLatest(): Promise<ResponseSnapshot> {
    if (this.stall === "read" && this.submitted) return new Promise<ResponseSnapshot>(() => {});
    return super.readLatest();
  }
}

function makeRealTimeAdapter(surface: StallingSurface) {
  return new UiAdapter({
    providerId: "ui:chatgpt",
    mapping: uiMapping("Capivara", { waits: { responseWaitTextMs: 0 } }),
    surface,
    clock: createSystemClock(),
    settings: { ...TEST_SETTINGS, pollIntervalMs: 50 },
    logger: createSilentLogger(),
  });
}

test("a stalled paste is abandoned at the request deadline", async () => {
  const surface = new StallingSurface();
  const startedAt = Date.now();
  const result = await makeRealTimeAdapter(surface).ask({
    conversation: "Capivara",
    kind: "text",
    model: "",
    prompt: "Hello",
    timeoutMs: 200,
  });
  const elapsed = Date.now() - startedAt;
  assert.ok(elapsed <= 350, `ask took ${elapsed}ms`);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, "TRANSPORT");
    assert.equal(result.error.retryable, true);
    assert.match(result.error.message, /^Could not submit prompt to ui:chatgpt: Paste timed out after \d+ms$/);
  }
  assert.deepEqual(surface.calls, []);
});

test("a stalled response read ends as an extraction timeout within one poll of the deadline", async () => {
  const surface = new StallingSurface();
  surface.stall = "read";
  const startedAt = Date.now();
  const result = await makeRealTimeAdapter(surface).ask({
    conversation: "Capivara",
    kind: "text",
    model: "",
    prompt: "Hello",
    timeoutMs: 200,
  });
  const elapsed = Date.now() - startedAt;
  assert.ok(elapsed <= 350, `ask took ${elapsed}ms`);
  assert.equal(result.ok ? "ok" : result.error.code, "EXTRACTION_TIMEOUT");
  assert.deepEqual(surface.calls, ["paste:Hello", "submit"]);
});
