import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";
import { BridgeError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";

const execFileAsync = promisify(execFileCb);

const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
const MAX_OUTPUT_BYTES = 8 * 1024 * 1024;

export interface BrowserTab {
  readonly id: string;
  open(url: string): Promise<void>;
  /** Runs a script in the page and returns its (awaited) JSON-able result. */
  evaluate(script: string): Promise<unknown>;
  click(selector: string): Promise<void>;
  press(key: string): Promise<void>;
  upload(selector: string, filePath: string): Promise<void>;
  reload(): Promise<void>;
}

export interface BrowserDriver {
  tab(id: string): BrowserTab;
}

export type CommandRunner = (
  binary: string,
  argv: string[],
  timeoutMs: number,
) => Promise<{ stdout: string; stderr: string }>;

export interface AgentBrowserDriverOptions {
  logger: BridgeLogger;
  profileDir?: string;
  headed?: boolean;
  binary?: string;
  commandTimeoutMs?: number;
  run?: CommandRunner;
}

const runWithExecFile: CommandRunner = async (binary, argv, timeoutMs) => {
  const { stdout, stderr } = await execFileAsync(binary, argv, {
    timeout: timeoutMs,
    windowsHide: true,
    maxBuffer: MAX_OUTPUT_BYTES,
    env: process.env,
  });
  return { stdout: String(stdout || ""), stderr: String(stderr || "") };
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function lastJsonLine(stdout: string): unknown {
  const lines = stdout.trim().split("\n").map((line) => line.trim()).filter(Boolean);
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    try {
      return JSON.parse(lines[index] ?? "");
    } catch {
      continue;
    }
  }
  return undefined;
}

/**
 * Reads `--json` output: `{ success, data, error }` envelopes are unwrapped
 * (`data.result` first), anything else is returned as parsed or as raw text.
 */
export function parseAgentOutput(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (!trimmed) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    parsed = lastJsonLine(trimmed);
    if (parsed === undefined) return trimmed;
  }
  if (!isRecord(parsed) || !("success" in parsed)) return parsed;
  if (parsed.success === false) {
    throw new Error(typeof parsed.error === "string" && parsed.error ? parsed.error : "agent-browser command failed");
  }
  const data = parsed.data;
  if (isRecord(data) && "result" in data) return data.result;
  return data ?? null;
}

function sessionName(id: string): string {
  const slug = id.toLowerCase().replace(/[^a-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
  return `chatbridge-${slug || "tab"}`;
}

class AgentBrowserTab implements BrowserTab {
  public constructor(
    public readonly id: string,
    private readonly exec: (argv: string[]) => Promise<unknown>,
  ) {}

  public async open(url: string): Promise<void> {
    await this.exec(["open", url]);
  }

  public async evaluate(script: string): Promise<unknown> {
    return this.exec(["eval", script]);
  }

  public async click(selector: string): Promise<void> {
    await this.exec(["click", selector]);
  }

  public async press(key: string): Promise<void> {
    await this.exec(["press", key]);
  }

  public async upload(selector: string, filePath: string): Promise<void> {
    await this.exec(["upload", selector, filePath]);
  }

  public async reload(): Promise<void> {
    await this.exec(["reload"]);
  }
}

/**
 * Drives the `agent-browser` CLI. Each tab id maps to its own named session
 * so the messaging client and every provider page keep separate pages.
 */
export class AgentBrowserDriver implements BrowserDriver {
  private readonly tabs = new Map<string, BrowserTab>();
  private readonly binary: string;
  private readonly commandTimeoutMs: number;
  private readonly run: CommandRunner;

  public constructor(private readonly options: AgentBrowserDriverOptions) {
    this.binary = options.binary ?? "agent-browser";
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.run = options.run ?? runWithExecFile;
  }

  public tab(id: string): BrowserTab {
    const existing = this.tabs.get(id);
    if (existing) return existing;
    const created = new AgentBrowserTab(id, (argv) => this.exec(id, argv));
    this.tabs.set(id, created);
    return created;
  }

  private async exec(tabId: string, command: string[]): Promise<unknown> {
    const argv = ["--session", sessionName(tabId), "--json"];
    if (this.options.profileDir) argv.push("--profile", this.options.profileDir);
    if (this.options.headed) argv.push("--headed");
    argv.push(...command);

    let stdout: string;
    try {
      ({ stdout } = await this.run(this.binary, argv, this.commandTimeoutMs));
    } catch (err) {
      const details = err instanceof Error ? err.message : String(err);
      const stderr = isRecord(err) && typeof err.stderr === "string" ? err.stderr.trim() : "";
      const timedOut = isRecord(err) && err.killed === true;
      this.options.logger.debug(`agent-browser ${command[0] ?? ""} failed for ${tabId}: ${stderr || details}`);
      throw new BridgeError({
        code: "TRANSPORT",
        retryable: true,
        message: timedOut
          ? `agent-browser ${command[0] ?? ""} timed out after ${this.commandTimeoutMs}ms`
          : `agent-browser ${command[0] ?? ""} failed: ${stderr || details}`,
        cause: err,
      });
    }

    try {
      return parseAgentOutput(stdout);
    } catch (err) {
      throw new BridgeError({
        code: "TRANSPORT",
        retryable: true,
        message: `agent-browser ${command[0] ?? ""} failed: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }
  }
}
