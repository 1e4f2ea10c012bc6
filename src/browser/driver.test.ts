import assert from "node:assert/strict";
import test from "node:test";

import { isBridgeError } from "../errors/index.js";
import { createSilentLogger } from "../logging/index.js";
import { AgentBrowserDriver, parseAgentOutput, type CommandRunner } from "./driver.js";
import { BrowserProviderSurface } from "./provider-surface.js";

function recordingRunner(outputs: string[]): { run: CommandRunner; calls: Array<{ binary: string; argv: string[]; timeoutMs: number }> } {
  const calls: Array<{ binary: string; argv: string[]; timeoutMs: number }> = [];
  const run: CommandRunner = async (binary, argv, timeoutMs) => {
    calls.push({ binary, argv, timeoutMs });
    return { stdout: outputs.shift() ?? "", stderr: "" };
  };
  return { run, calls };
}

test("parseAgentOutput unwraps envelopes and tolerates noise", () => {
  assert.equal(parseAgentOutput('{"success":true,"data":{"result":"done"}}'), "done");
  assert.deepEqual(parseAgentOutput('{"success":true,"data":{"url":"https://a.test"}}'), { url: "https://a.test" });
  assert.equal(parseAgentOutput("warming up\n{\"success\":true,\"data\":{\"result\":3}}"), 3);
  assert.equal(parseAgentOutput("plain text"), "plain text");
  assert.equal(parseAgentOutput("  "), null);
  assert.throws(() => parseAgentOutput('{"success":false,"error":"no element"}'), /no element/);
});

test("each tab runs under its own session with the profile dir", async () => {
  const { run, calls } = recordingRunner(['{"success":true,"data":{}}', '{"success":true,"data":{"result":2}}']);
  const driver = new AgentBrowserDriver({
    logger: createSilentLogger(),
    profileDir: "/tmp/profile",
    commandTimeoutMs: 5_000,
    run,
  });
  const tab = driver.tab("ui:ChatGPT");
  assert.equal(driver.tab("ui:ChatGPT"), tab);
  await tab.open("https://chat.example.test/");
  assert.equal(await tab.evaluate("1 + 1"), 2);
  assert.deepEqual(calls[0], {
    binary: "agent-browser",
    argv: ["--session", "chatbridge-ui-chatgpt", "--json", "--profile", "/tmp/profile", "open", "https://chat.example.test/"],
    timeoutMs: 5_000,
  });
  assert.deepEqual(calls[1]?.argv.slice(-2), ["eval", "1 + 1"]);
});

test("command failures become retryable transport errors", async () => {
  const driver = new AgentBrowserDriver({
    logger: createSilentLogger(),
    run: async () => {
      throw Object.assign(new Error("Command failed"), { stderr: "browser crashed\n" });
    },
  });
  await assert.rejects(driver.tab("messaging").reload(), (error: unknown) => {
    assert.ok(isBridgeError(error));
    assert.equal(error.code, "TRANSPORT");
    assert.equal(error.retryable, true);
    assert.equal(error.message, "agent-browser reload failed: browser crashed");
    return true;
  });
});

test("provider surface submits with the button or falls back to Enter", async () => {
  const { run, calls } = recordingRunner([]);
  const driver = new AgentBrowserDriver({ logger: createSilentLogger(), run });
  const selectors = { input: "#prompt", response: ".answer", authenticated: "#prompt" };
  const withButton = new BrowserProviderSurface(driver.tab("a"), {
    url: "https://a.test/",
    selectors: { ...selectors, submit: "button[type=submit]" },
  });
  await withButton.submit();
  const withoutButton = new BrowserProviderSurface(driver.tab("b"), { url: "https://b.test/", selectors });
  await withoutButton.submit();
  assert.deepEqual(
    calls.map((call) => call.argv.slice(3)),
    [["click", "button[type=submit]"], ["click", "#prompt"], ["press", "Enter"]],
  );
  assert.equal(withoutButton.supportsImages, false);
});

test("provider surface reads the latest block and the auth marker", async () => {
  const { run } = recordingRunner([
    '{"success":true,"data":{"result":{"turns":4,"text":"Hi there"}}}',
    '{"success":true,"data":{"result":"login"}}',
    '{"success":true,"data":{"result":42}}',
  ]);
  const driver = new AgentBrowserDriver({ logger: createSilentLogger(), run });
  const surface = new BrowserProviderSurface(driver.tab("a"), {
    url: "https://a.test/",
    selectors: { input: "#prompt", response: ".answer", authenticated: "#prompt", login: "#login" },
  });
  assert.deepEqual(await surface.readLatest(), { turns: 4, text: "Hi there" });
  assert.equal(await surface.probeAuth(), "login");
  assert.equal(await surface.probeAuth(), "unknown");
});
