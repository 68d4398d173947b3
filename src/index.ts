export { SubstitutionRotor } from "./core/rotor";
export { AssemblyBuffer } from "./core/buffer";
export { parseFrame, parseSignedInt, describeFrame } from "./core/frame";
export { interpret, applyFrame } from "./core/interpreter";
export { DecoderLoop, DEFAULT_MAX_IDLE_POLLS, type LoopOptions } from "./core/loop";
export {
  DecoderError,
  MalformedFrameError,
  TransportFailureError,
  ConfigError,
} from "./core/errors";
export type * from "./core/types";
export { ArrayLineSource, BufferedLineSource } from "./infra/lineSource";
export { decodeStream, type StreamOptions } from "./infra/stream";
export { LogReporter } from "./infra/reporter";
export { loadConfig, type DecoderConfig } from "./config";
export { makeLogger, type Logger, type LogLevel } from "./logging";
export type { Shift } from "./types/brands";
