import type { Readable } from "node:stream";
import { DecoderLoop, type LoopOptions } from "../core/loop";
import type { DecodeResult } from "../core/types";
import { BufferedLineSource } from "./lineSource";

export type StreamOptions = LoopOptions & {
  /**
   * Poll the loop this often while no data arrives. Each tick without a
   * complete line is one idle poll. Unset: only end-of-stream stops.
   */
  pollIntervalMs?: number;
};

/**
 * Decode whatever a readable stream (file, pipe, serial device) delivers.
 * Resolves once END is seen, the stream ends, or the idle limit is hit.
 * A stream error rejects with a TransportFailureError carrying the
 * partial message.
 */
export function decodeStream(
  input: Readable,
  opts: StreamOptions = {},
): Promise<DecodeResult> {
  const source = new BufferedLineSource();
  const loop = new DecoderLoop(source, opts);
  const text = new TextDecoder();

  return new Promise<DecodeResult>((resolve, reject) => {
    let settled = false;
    const timer =
      opts.pollIntervalMs === undefined
        ? null
        : setInterval(() => {
            loop.poll();
            settle();
          }, opts.pollIntervalMs);

    const onData = (chunk: string | Uint8Array) => {
      source.push(typeof chunk === "string" ? chunk : text.decode(chunk, { stream: true }));
      loop.pump();
      settle();
    };
    const onEnd = () => {
      source.push(text.decode());
      source.end();
      loop.pump();
      settle();
    };
    const onError = (err: Error) => {
      loop.abort(err);
      settle();
    };

    function settle(): void {
      if (settled || loop.state === "RUNNING") return;
      settled = true;
      if (timer) clearInterval(timer);
      input.off("data", onData).off("end", onEnd);
      // errors raised while the stream closes still need a listener
      if (input.closed) input.off("error", onError);
      else input.once("close", () => input.off("error", onError));
      if (!input.readableEnded) input.destroy();
      try {
        resolve(loop.result());
      } catch (err) {
        reject(err);
      }
    }

    input.on("data", onData).once("end", onEnd).on("error", onError);
  });
}
