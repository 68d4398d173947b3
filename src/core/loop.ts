import { AssemblyBuffer } from "./buffer";
import { TransportFailureError } from "./errors";
import { describeFrame } from "./frame";
import { interpret } from "./interpreter";
import { SubstitutionRotor } from "./rotor";
import type {
  DecodeResult,
  DecodeStats,
  DecoderHooks,
  LineSource,
  LoopState,
  StopReason,
} from "./types";

export const DEFAULT_MAX_IDLE_POLLS = 10;

export type LoopOptions = {
  hooks?: DecoderHooks;
  /** Consecutive empty polls before the stream counts as ended. */
  maxIdlePolls?: number;
};

/**
 * Drives one rotor and one buffer from a line source until END, end of
 * stream, the idle limit, or a transport fault.
 */
export class DecoderLoop {
  private readonly rotor = new SubstitutionRotor();
  private readonly buffer = new AssemblyBuffer();
  private readonly hooks: DecoderHooks;
  private readonly maxIdlePolls: number;

  private _state: LoopState = "RUNNING";
  private _reason: StopReason | null = null;
  private failure: TransportFailureError | null = null;
  private idlePolls = 0;
  private counts = { data: 0, remap: 0, malformed: 0 };

  constructor(
    private readonly source: LineSource,
    opts: LoopOptions = {},
  ) {
    this.hooks = opts.hooks ?? {};
    this.maxIdlePolls = opts.maxIdlePolls ?? DEFAULT_MAX_IDLE_POLLS;
  }

  get state(): LoopState {
    return this._state;
  }

  get reason(): StopReason | null {
    return this._reason;
  }

  /** One iteration: read at most one line and dispatch it. */
  poll(): LoopState {
    if (this._state === "STOPPED") return this._state;

    let line: string | null;
    try {
      line = this.source.nextLine();
    } catch (err) {
      this.failure = new TransportFailureError(err);
      return this.stop("failed");
    }

    if (line === null) {
      if (this.source.exhausted) return this.stop("exhausted");
      this.idlePolls++;
      if (this.idlePolls >= this.maxIdlePolls) return this.stop("idle");
      return this._state;
    }

    this.idlePolls = 0;
    this.feed(line);
    return this._state;
  }

  /** Dispatch every line the source already holds; idle polls are not counted. */
  pump(): LoopState {
    while (this._state === "RUNNING") {
      let line: string | null;
      try {
        line = this.source.nextLine();
      } catch (err) {
        this.failure = new TransportFailureError(err);
        return this.stop("failed");
      }
      if (line === null) {
        if (this.source.exhausted) this.stop("exhausted");
        break;
      }
      this.idlePolls = 0;
      this.feed(line);
    }
    return this._state;
  }

  /** Poll until stopped. Throws the transport failure, if any, after finishing. */
  run(): DecodeResult {
    while (this._state === "RUNNING") this.poll();
    return this.result();
  }

  /** Stop from outside, e.g. when a stream errors before the source sees it. */
  abort(cause: unknown): void {
    if (this._state === "STOPPED") return;
    this.failure = new TransportFailureError(cause);
    this.stop("failed");
  }

  result(): DecodeResult {
    if (this.failure) throw this.failure;
    if (this._reason === null) throw new Error("decoder is still running");
    return {
      symbols: this.buffer.render(),
      text: this.buffer.toString(),
      reason: this._reason,
      stats: this.stats(),
    };
  }

  stats(): DecodeStats {
    return { ...this.counts, shift: this.rotor.shift };
  }

  private feed(line: string): void {
    const out = interpret(line, this.rotor, this.buffer);
    if ("error" in out) {
      this.counts.malformed++;
      this.hooks.onMalformed?.(out.error);
      return;
    }

    if (out.frame.type === "data") this.counts.data++;
    if (out.frame.type === "remap") this.counts.remap++;
    this.hooks.onFrameProcessed?.(
      describeFrame(out.frame),
      { shift: this.rotor.shift },
      this.buffer.render(),
    );
    if (out.signal === "stop") this.stop("terminated");
  }

  private stop(reason: StopReason): LoopState {
    this._state = "STOPPED";
    this._reason = reason;
    const symbols = this.buffer.render();
    if (this.failure) this.failure.partial = symbols.join("");
    this.hooks.onFinished?.(symbols);
    return this._state;
  }
}
