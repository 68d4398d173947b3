import * as v from "valibot";
import { ConfigError } from "./core/errors";
import { DEFAULT_MAX_IDLE_POLLS } from "./core/loop";
import type { LogLevel } from "./logging";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const positiveInt = (fallback: number) =>
  v.optional(
    v.pipe(
      v.string(),
      v.transform((s: string) => Number(s)),
      v.number(),
      v.integer(),
      v.minValue(1),
    ),
    String(fallback),
  );

const envSchema = v.object({
  LOG_LEVEL: v.optional(v.picklist(LEVELS), "info"),
  DECODER_MAX_IDLE_POLLS: positiveInt(DEFAULT_MAX_IDLE_POLLS),
  DECODER_POLL_INTERVAL_MS: positiveInt(500),
  DECODER_LOG_PRETTY: v.optional(v.picklist(["0", "1"])),
});

export type DecoderConfig = {
  logLevel: LogLevel;
  maxIdlePolls: number;
  pollIntervalMs: number;
  /** undefined: decide from whether stderr is a terminal */
  pretty: boolean | undefined;
  /** null: read standard input */
  input: string | null;
};

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  argv: readonly string[] = process.argv.slice(2),
): DecoderConfig {
  const issues: string[] = [];
  const parsed = v.safeParse(envSchema, env);
  if (!parsed.success) {
    for (const issue of parsed.issues) {
      issues.push(`${v.getDotPath(issue) ?? "env"}: ${issue.message}`);
    }
  }
  if (argv.length > 1) issues.push(`unexpected arguments: ${argv.slice(1).join(" ")}`);
  if (!parsed.success || issues.length > 0) throw new ConfigError(issues);

  const out = parsed.output;
  const path = argv[0];
  return {
    logLevel: out.LOG_LEVEL,
    maxIdlePolls: out.DECODER_MAX_IDLE_POLLS,
    pollIntervalMs: out.DECODER_POLL_INTERVAL_MS,
    pretty: out.DECODER_LOG_PRETTY === undefined ? undefined : out.DECODER_LOG_PRETTY === "1",
    input: path === undefined || path === "-" ? null : path,
  };
}
