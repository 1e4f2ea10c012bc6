#!/usr/bin/env node
import { parseArgs } from "node:util";
import { createBridge } from "./bridge/index.js";
import { loadConfig, type BridgeConfig } from "./config/index.js";
import { describeUnknownError, isBridgeError } from "./errors/index.js";
import { createLogger, isLogLevelName, parseLogLevel } from "./logging/index.js";

const USAGE = "Usage: chatbridge [--config <path>] [--log-level debug|info|warn|error] [--log-file <path>]";

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      config: { type: "string", short: "c" },
      "log-level": { type: "string" },
      "log-file": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
  });
  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const levelArg = values["log-level"] ?? process.env.CHATBRIDGE_LOG_LEVEL;
  if (levelArg !== undefined && !isLogLevelName(levelArg)) {
    console.error(`Unknown log level "${levelArg}"\n${USAGE}`);
    return 1;
  }
  const logger = createLogger({ level: parseLogLevel(levelArg), file: values["log-file"] });

  let config: BridgeConfig;
  try {
    config = loadConfig({ configPath: values.config });
  } catch (error) {
    logger.error(describeUnknownError(error));
    return 1;
  }
  logger.info(`Loaded ${config.conversations.length} conversations from ${config.configPath}`);

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.info(`Received ${signal}, stopping after the current message`);
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    const bridge = createBridge(config, { logger });
    await bridge.run(controller.signal);
    return 0;
  } catch (error) {
    const code = isBridgeError(error) ? ` [${error.code}]` : "";
    logger.fatal(`Bridge stopped${code}: ${describeUnknownError(error)}`);
    return 1;
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(describeUnknownError(error));
    process.exitCode = 1;
  });
