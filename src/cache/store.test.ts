import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { createSilentLogger } from "../logging/index.js";
import { CacheStore } from "./store.js";

function makeWorkspace(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "chatbridge-cache-"));
}

test("mark is durable for a fresh store on the same file", () => {
  const workspace = makeWorkspace();
  try {
    const file = path.join(workspace, "state", ".cache.json");
    const store = new CacheStore({ file, logger: createSilentLogger(), now: () => 1_000 });
    store.load();
    assert.equal(store.seen("fp-1"), false);
    store.mark("fp-1", 42_000);

    const restarted = new CacheStore({ file, logger: createSilentLogger() });
    restarted.load();
    assert.equal(restarted.seen("fp-1"), true);
    assert.deepEqual(restarted.get("fp-1"), { fingerprint: "fp-1", processedAt: 42_000 });
    assert.deepEqual(
      fs.readdirSync(path.dirname(file)).filter((name) => name.endsWith(".tmp")),
      [],
    );
  } finally {
    fs.rmSync(workspace, { recursive: true, force: true });
  }
});

test("corrupt cache file loads as empty", () => {
  const workspace = makeWorkspace();
  try {
    const file = path.join(workspace, ".cache.json");
    fs.writeFileSync(file, "{ truncated", "utf8");
    const store = new CacheStore({ file, logger: createSilentLogger() });
    store.load();
    assert.equal(store.size, 0);
    store.mark("fp-2", 1);
    assert.equal(JSON.parse(fs.readFileSync(file, "utf8")).entries["fp-2"], 1);
  } finally {
    fs.rmSync(workspace, { recursive: true, force: true });
  }
});

test("flat key to seconds maps are accepted", () => {
  const workspace = makeWorkspace();
  try {
    const file = path.join(workspace, ".cache.json");
    fs.writeFileSync(file, JSON.stringify({ "Capivara:abc": 1_700_000_000.5, broken: "x" }), "utf8");
    const store = new CacheStore({ file, logger: createSilentLogger() });
    store.load();
    assert.equal(store.size, 1);
    assert.equal(store.get("Capivara:abc")?.processedAt, 1_700_000_000_500);
  } finally {
    fs.rmSync(workspace, { recursive: true, force: true });
  }
});

test("window retention drops old and excess entries", () => {
  const workspace = makeWorkspace();
  try {
    const file = path.join(workspace, ".cache.json");
    const store = new CacheStore({
      file,
      logger: createSilentLogger(),
      retention: { kind: "window", maxAgeMs: 10_000, maxEntries: 2 },
      now: () => 100_000,
    });
    store.load();
    store.mark("ancient", 50_000);
    assert.equal(store.seen("ancient"), false);
    store.mark("a", 95_000);
    store.mark("b", 96_000);
    store.mark("c", 97_000);
    assert.equal(store.seen("a"), false);
    assert.equal(store.seen("b"), true);
    assert.equal(store.seen("c"), true);
  } finally {
    fs.rmSync(workspace, { recursive: true, force: true });
  }
});
