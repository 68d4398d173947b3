export type ErrorCode =
  | "MALFORMED_FRAME"
  | "TRANSPORT_FAILURE"
  | "CONFIG_INVALID";

export class DecoderError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A line that is not one of `L,<c>`, `L,Space`, `M,<int>` or `END`. */
export class MalformedFrameError extends DecoderError {
  constructor(
    readonly line: string,
    readonly reason: string,
  ) {
    super("MALFORMED_FRAME", `malformed frame ${JSON.stringify(line)}: ${reason}`);
  }
}

export class TransportFailureError extends DecoderError {
  /** Message decoded before the transport failed. */
  partial = "";

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("TRANSPORT_FAILURE", `transport failed: ${detail}`, { cause });
  }
}

export class ConfigError extends DecoderError {
  constructor(readonly issues: readonly string[]) {
    super("CONFIG_INVALID", `invalid configuration: ${issues.join("; ")}`);
  }
}
