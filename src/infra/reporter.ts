import type { MalformedFrameError } from "../core/errors";
import type { DecoderHooks, RotorSummary } from "../core/types";
import type { Logger } from "../logging";

/** Presentation hooks that narrate decoding through a pino logger. */
export class LogReporter implements DecoderHooks {
  constructor(private readonly log: Logger) {}

  onFrameProcessed(
    description: string,
    rotor: RotorSummary,
    buffer: readonly string[],
  ): void {
    this.log.debug(
      { frame: description, shift: rotor.shift, length: buffer.length },
      "frame processed",
    );
  }

  onMalformed(error: MalformedFrameError): void {
    this.log.warn({ line: error.line, reason: error.reason }, "malformed frame skipped");
  }

  onFinished(symbols: readonly string[]): void {
    this.log.info(
      { message: symbols.join(""), length: symbols.length },
      "message assembled",
    );
  }
}
