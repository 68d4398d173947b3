#!/usr/bin/env tsx
import { createReadStream } from "node:fs";
import { loadConfig, type DecoderConfig } from "./config";
import { ConfigError, TransportFailureError } from "./core/errors";
import { LogReporter } from "./infra/reporter";
import { decodeStream } from "./infra/stream";
import { makeLogger } from "./logging";

async function main(): Promise<number> {
  let config: DecoderConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    process.stderr.write(`${err.message}\n`);
    return 1;
  }

  const log = makeLogger(config.logLevel, {
    pretty: config.pretty ?? Boolean(process.stderr.isTTY),
  });
  const input = config.input === null ? process.stdin : createReadStream(config.input);

  log.info({ input: config.input ?? "stdin" }, "decoder started");
  try {
    const result = await decodeStream(input, {
      hooks: new LogReporter(log),
      maxIdlePolls: config.maxIdlePolls,
      pollIntervalMs: config.pollIntervalMs,
    });
    process.stdout.write(`${result.text}\n`);
    log.info({ reason: result.reason, ...result.stats }, "decoder finished");
    return 0;
  } catch (err) {
    if (!(err instanceof TransportFailureError)) throw err;
    log.error({ err, partial: err.partial }, "decoder stopped: transport failure");
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
