import assert from "node:assert/strict";
import test from "node:test";

import { isBridgeError } from "../errors/index.js";
import { createSilentLogger } from "../logging/index.js";
import { apiMapping, makeMessage, uiMapping } from "../testing/fixtures.js";
import { ChatRouter, providerIdFor } from "./index.js";
import { renderTemplate, truncatePrompt } from "./prompt.js";

function makeRouter() {
  return new ChatRouter({
    conversations: [
      uiMapping("Capivara", { textPromptTemplate: "Reply briefly: {message}" }),
      apiMapping("VanDog", { imagePromptTemplate: "Describe: {message}", maxPromptChars: 20 }),
    ],
    defaultTimeoutMs: 120_000,
    logger: createSilentLogger(),
  });
}

test("resolve is case-sensitive and returns null for unknown conversations", () => {
  const router = makeRouter();
  assert.equal(router.resolve("Capivara")?.transport, "ui");
  assert.equal(router.resolve("capivara"), null);
  assert.equal(router.resolve("Strangers"), null);
  assert.deepEqual(
    router.list().map((mapping) => mapping.name),
    ["Capivara", "VanDog"],
  );
});

test("text messages use the text model and template", () => {
  const router = makeRouter();
  const mapping = router.resolve("Capivara");
  assert.ok(mapping);
  const decision = router.route(mapping, makeMessage("Capivara", "  Hello  "));
  assert.equal(decision.kind, "text");
  assert.equal(decision.prompt, "Reply briefly: Hello");
  assert.equal(decision.providerId, "ui:chatgpt");
  assert.equal(decision.timeoutMs, 30_000);
});

test("image messages use the vision model and caption, truncated to the limit", () => {
  const router = makeRouter();
  const mapping = router.resolve("VanDog");
  assert.ok(mapping);
  const decision = router.route(
    mapping,
    makeMessage("VanDog", "blob:https://web.example.test/1", { kind: "image", caption: "our new dog at the beach" }),
  );
  assert.equal(decision.model, "grok-2-vision-1212");
  assert.equal(decision.prompt, "Describe: our new...");
  assert.equal(decision.timeoutMs, 120_000);
  assert.equal(providerIdFor(mapping), "api:grok");
});

test("a mapping timeout above the maximum response wait is capped", () => {
  const router = new ChatRouter({
    conversations: [uiMapping("Capivara", { waits: { responseTimeoutMs: 600_000 } })],
    defaultTimeoutMs: 120_000,
    logger: createSilentLogger(),
  });
  const mapping = router.resolve("Capivara");
  assert.ok(mapping);
  assert.equal(router.route(mapping, makeMessage("Capivara", "Hello")).timeoutMs, 120_000);
});

test("empty text and image without reference are malformed input", () => {
  const router = makeRouter();
  const mapping = router.resolve("Capivara");
  assert.ok(mapping);
  for (const message of [makeMessage("Capivara", "   "), makeMessage("Capivara", "", { kind: "image" })]) {
    assert.throws(
      () => router.route(mapping, message),
      (error: unknown) => isBridgeError(error) && error.code === "MALFORMED_INPUT",
    );
  }
});

test("template helpers replace every placeholder and cut on characters", () => {
  assert.equal(renderTemplate("{message} / {message}", "hi"), "hi / hi");
  assert.equal(renderTemplate("static prompt", "hi"), "static prompt");
  assert.equal(truncatePrompt("short", 10), "short");
  assert.equal(truncatePrompt("ééééééééé", 5), "éé...");
});
