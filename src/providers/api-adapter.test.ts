import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { BridgeError } from "../errors/index.js";
import { createSilentLogger } from "../logging/index.js";
import { createManualClock } from "../shared/clock.js";
import { FakeProviderClient, type ClientStep } from "../testing/fakes.js";
import { TEST_SETTINGS, apiMapping } from "../testing/fixtures.js";
import { ApiAdapter, backoffDelayMs } from "./api-adapter.js";
import type { ApiConversationMapping } from "../config/types.js";

const PNG_HEADER = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);

function makeAdapter(steps: ClientStep[], mapping: Partial<ApiConversationMapping> = {}, maxImageBytes = 1024) {
  const clock = createManualClock(0);
  const client = new FakeProviderClient("grok", steps);
  const adapter = new ApiAdapter({
    providerId: "api:grok",
    mapping: apiMapping("VanDog", mapping),
    client,
    credentials: { apiKey: "test-secret", baseURL: "https://api.x.ai/v1", maxTokens: 700, temperature: 0.7 },
    clock,
    settings: { ...TEST_SETTINGS, maxImageBytes },
    logger: createSilentLogger(),
  });
  return { adapter, client, clock };
}

function withImage(run: (imagePath: string) => Promise<void>): Promise<void> {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "chatbridge-api-"));
  const imagePath = path.join(root, "vandog.png");
  fs.writeFileSync(imagePath, PNG_HEADER);
  return run(imagePath).finally(() => fs.rmSync(root, { recursive: true, force: true }));
}

const transient = () => new BridgeError({ code: "TRANSPORT", message: "connection reset" });

test("backoff doubles from the base up to the ceiling", () => {
  assert.deepEqual(
    [1, 2, 3, 4, 5, 6].map((attempt) => backoffDelayMs(attempt, 500, 8_000)),
    [500, 1_000, 2_000, 4_000, 8_000, 8_000],
  );
});

test("image request retries two transient failures and succeeds on the third attempt", async () => {
  await withImage(async (imagePath) => {
    const { adapter, client, clock } = makeAdapter([transient(), transient(), "  A van and a dog.\n"]);
    const result = await adapter.ask({
      conversation: "VanDog",
      kind: "image",
      model: "grok-2-vision-1212",
      prompt: "Describe this image briefly.",
      imagePath,
      timeoutMs: 30_000,
    });
    assert.deepEqual(result, { ok: true, text: "A van and a dog.", attempts: 3 });
    assert.deepEqual(clock.slept, [500, 1_000]);
    assert.equal(client.requests.length, 3);
    assert.equal(client.requests[0]?.image?.mediaType, "image/png");
    assert.equal(client.requests[0]?.image?.base64, PNG_HEADER.toString("base64"));
    assert.equal(client.requests[0]?.maxTokens, 700);
  });
});

test("transient failures stop at the attempt ceiling", async () => {
  const { adapter, client } = makeAdapter([transient(), transient(), transient(), "too late"]);
  const result = await adapter.ask({ conversation: "VanDog", kind: "text", model: "m", prompt: "Hi", timeoutMs: 30_000 });
  assert.equal(result.ok, false);
  assert.equal(result.attempts, 3);
  assert.equal(client.requests.length, 3);
});

test("non-retryable errors are returned after one attempt", async () => {
  const { adapter } = makeAdapter([new BridgeError({ code: "AUTH_FAILED", message: "bad key" }), "unused"]);
  const result = await adapter.ask({ conversation: "VanDog", kind: "text", model: "m", prompt: "Hi", timeoutMs: 30_000 });
  assert.equal(result.ok ? "ok" : result.error.code, "AUTH_FAILED");
  assert.equal(result.attempts, 1);
});

test("retry-after beyond the deadline ends the attempts early", async () => {
  const { adapter, clock } = makeAdapter([
    new BridgeError({ code: "TRANSPORT", message: "rate limited", retryAfterMs: 60_000 }),
    "unused",
  ]);
  const result = await adapter.ask({ conversation: "VanDog", kind: "text", model: "m", prompt: "Hi", timeoutMs: 30_000 });
  assert.equal(result.ok, false);
  assert.equal(result.attempts, 1);
  assert.deepEqual(clock.slept, []);
});

test("oversized and missing images are rejected before any request", async () => {
  await withImage(async (imagePath) => {
    const { adapter, client } = makeAdapter(["unused"], {}, 4);
    const result = await adapter.ask({
      conversation: "VanDog",
      kind: "image",
      model: "m",
      prompt: "Describe",
      imagePath,
      timeoutMs: 30_000,
    });
    assert.equal(result.ok ? "ok" : result.error.code, "MALFORMED_INPUT");
    assert.equal(client.requests.length, 0);
  });
  const { adapter } = makeAdapter(["unused"]);
  const missing = await adapter.ask({ conversation: "VanDog", kind: "image", model: "m", prompt: "Describe", timeoutMs: 1_000 });
  assert.equal(missing.ok ? "ok" : missing.error.code, "MALFORMED_INPUT");
});

test("history keeps the last exchanges and the system prompt is passed through", async () => {
  const { adapter, client } = makeAdapter(["one", "two", "three"], { historyTurns: 1, systemPrompt: "Be brief." });
  for (const prompt of ["a", "b", "c"]) {
    await adapter.ask({ conversation: "VanDog", kind: "text", model: "m", prompt, timeoutMs: 30_000 });
  }
  assert.deepEqual(client.requests[0]?.history, []);
  assert.deepEqual(client.requests[2]?.history, [
    { role: "user", content: "b" },
    { role: "assistant", content: "two" },
  ]);
  assert.equal(client.requests[2]?.systemPrompt, "Be brief.");
});

test("API replies keep their line breaks and brackets, in the result and in history", async () => {
  const reply = "Use arr[0] first.\n\n1. open\n2. close";
  const { adapter, client } = makeAdapter([`${reply}\n`, "ok"], { historyTurns: 1 });
  const first = await adapter.ask({ conversation: "VanDog", kind: "text", model: "m", prompt: "steps?", timeoutMs: 30_000 });
  assert.deepEqual(first, { ok: true, text: reply, attempts: 1 });

  await adapter.ask({ conversation: "VanDog", kind: "text", model: "m", prompt: "thanks", timeoutMs: 30_000 });
  assert.deepEqual(client.requests[1]?.history, [
    { role: "user", content: "steps?" },
    { role: "assistant", content: reply },
  ]);
});
