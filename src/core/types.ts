import type { MalformedFrameError } from "./errors";
import type { Shift } from "../types/brands";

/* ── wire frames ─────────────────────────────────────────── */
export type Frame =
  | { type: "data"; symbol: string }
  | { type: "remap"; delta: number }
  | { type: "terminate" };

export type ParseResult =
  | { ok: true; frame: Frame }
  | { ok: false; error: MalformedFrameError };

export type Signal = "continue" | "stop";

/** Outcome of feeding one line to the interpreter. */
export type Dispatch =
  | { signal: Signal; frame: Frame; decoded?: string }
  | { signal: "continue"; error: MalformedFrameError };

/* ── transport collaborator ──────────────────────────────── */
export interface LineSource {
  /** Next complete line without its terminator, or null if none is buffered yet. */
  nextLine(): string | null;
  /** True once no further line will ever be produced. */
  readonly exhausted: boolean;
}

/* ── presentation collaborator ───────────────────────────── */
export interface RotorSummary {
  shift: Shift;
}

export interface DecoderHooks {
  onFrameProcessed?(
    description: string,
    rotor: RotorSummary,
    buffer: readonly string[],
  ): void;
  onMalformed?(error: MalformedFrameError): void;
  onFinished?(symbols: readonly string[]): void;
}

/* ── loop state ──────────────────────────────────────────── */
export type LoopState = "RUNNING" | "STOPPED";
export type StopReason = "terminated" | "exhausted" | "idle" | "failed";

export type DecodeStats = {
  data: number;
  remap: number;
  malformed: number;
  shift: Shift;
};

export type DecodeResult = {
  symbols: readonly string[];
  text: string;
  reason: StopReason;
  stats: DecodeStats;
};
