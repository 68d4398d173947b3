import { describe, it, expect, vi } from "vitest";
import { DecoderLoop } from "../src/core/loop";
import { TransportFailureError } from "../src/core/errors";
import { ArrayLineSource, BufferedLineSource } from "../src/infra/lineSource";
import type { DecoderHooks } from "../src/core/types";
import { ScriptedSource } from "./helpers/source";
import { SAMPLE } from "./helpers/frames";

const spyHooks = () => ({
  onFrameProcessed: vi.fn<NonNullable<DecoderHooks["onFrameProcessed"]>>(),
  onMalformed: vi.fn<NonNullable<DecoderHooks["onMalformed"]>>(),
  onFinished: vi.fn<NonNullable<DecoderHooks["onFinished"]>>(),
});

describe("DecoderLoop", () => {
  it("decodes the sample transmission", () => {
    const loop = new DecoderLoop(new ArrayLineSource(SAMPLE));
    const result = loop.run();
    expect(result.symbols).toEqual(["H", "O", "L", "C", " ", "Y", "O", "R", "L", "D"]);
    expect(result.text).toBe("HOLC YORLD");
    expect(result.reason).toBe("terminated");
    expect(result.stats).toEqual({ data: 10, remap: 2, malformed: 0, shift: 0 });
    expect(loop.state).toBe("STOPPED");
  });

  it("does not read past END", () => {
    const source = new ScriptedSource(["L,A", "END", "L,B"]);
    const result = new DecoderLoop(source).run();
    expect(result.text).toBe("A");
    expect(source.reads).toBe(2);
  });

  it("stops when the source is exhausted", () => {
    const result = new DecoderLoop(new ArrayLineSource(["L,H", "L,I"])).run();
    expect(result.reason).toBe("exhausted");
    expect(result.text).toBe("HI");
  });

  it("renders an empty message for an empty stream", () => {
    const hooks = spyHooks();
    const result = new DecoderLoop(new ArrayLineSource([]), { hooks }).run();
    expect(result.symbols).toEqual([]);
    expect(result.text).toBe("");
    expect(hooks.onFinished).toHaveBeenCalledTimes(1);
    expect(hooks.onFinished).toHaveBeenCalledWith([]);
  });

  it("gives up after the configured number of consecutive idle polls", () => {
    const source = new ScriptedSource(["L,A"], false);
    const result = new DecoderLoop(source, { maxIdlePolls: 3 }).run();
    expect(result.reason).toBe("idle");
    expect(result.text).toBe("A");
    expect(source.reads).toBe(4);
  });

  it("resets the idle count when a line arrives", () => {
    const source = new ScriptedSource(["L,A", null, null, "L,B"], false);
    const result = new DecoderLoop(source, { maxIdlePolls: 3 }).run();
    expect(result.text).toBe("AB");
    expect(source.reads).toBe(7);
  });

  it("polls one line at a time", () => {
    const loop = new DecoderLoop(new ArrayLineSource(["L,A", "END"]));
    expect(loop.poll()).toBe("RUNNING");
    expect(loop.reason).toBeNull();
    expect(() => loop.result()).toThrow("decoder is still running");
    expect(loop.poll()).toBe("STOPPED");
    expect(loop.reason).toBe("terminated");
    expect(loop.poll()).toBe("STOPPED");
  });

  it("pumps only what the source already holds", () => {
    const source = new BufferedLineSource();
    const loop = new DecoderLoop(source, { maxIdlePolls: 1 });
    source.push("L,A\nL,B");
    expect(loop.pump()).toBe("RUNNING");
    expect(loop.stats().data).toBe(1);
    source.push("\nEND\n");
    expect(loop.pump()).toBe("STOPPED");
    expect(loop.result().text).toBe("AB");
  });

  it("applies remaps of any magnitude by their residue", () => {
    const lines = ["M,100000000000000000001", "L,A", "END"];
    const result = new DecoderLoop(new ArrayLineSource(lines)).run();
    expect(result.text).toBe("X");
    expect(result.stats).toEqual({ data: 1, remap: 1, malformed: 0, shift: 23 });
  });

  it("skips malformed lines and keeps going", () => {
    const hooks = spyHooks();
    const lines = ["X,?", "L,", "M,abc", "L,AB", "", "L,Z", "END"];
    const result = new DecoderLoop(new ArrayLineSource(lines), { hooks }).run();
    expect(result.text).toBe("Z");
    expect(result.stats).toEqual({ data: 1, remap: 0, malformed: 5, shift: 0 });
    expect(hooks.onMalformed).toHaveBeenCalledTimes(5);
    const first = hooks.onMalformed.mock.calls[0][0];
    expect(first.line).toBe("X,?");
    expect(first.reason).toBe("unrecognized frame");
  });

  it("reports every processed frame with the rotor state after it", () => {
    const hooks = spyHooks();
    new DecoderLoop(new ArrayLineSource(["L,a", "M,-27", "L,Space", "END"]), {
      hooks,
    }).run();
    expect(hooks.onFrameProcessed.mock.calls).toEqual([
      ["L,a", { shift: 0 }, ["A"]],
      ["M,-27", { shift: 25 }, ["A"]],
      ["L,Space", { shift: 25 }, ["A", " "]],
      ["END", { shift: 25 }, ["A", " "]],
    ]);
    expect(hooks.onFinished).toHaveBeenCalledTimes(1);
    expect(hooks.onFinished).toHaveBeenCalledWith(["A", " "]);
  });

  it("stops on a transport fault and surfaces it with the partial message", () => {
    const hooks = spyHooks();
    const source = new ScriptedSource(["L,H", "L,I", new Error("port unplugged"), "L,X"]);
    const loop = new DecoderLoop(source, { hooks });

    expect(() => loop.run()).toThrow(TransportFailureError);
    expect(loop.reason).toBe("failed");
    expect(source.reads).toBe(3);
    expect(hooks.onFinished).toHaveBeenCalledTimes(1);
    expect(hooks.onFinished).toHaveBeenCalledWith(["H", "I"]);

    let caught: unknown;
    try {
      loop.result();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TransportFailureError);
    expect(caught).toMatchObject({ code: "TRANSPORT_FAILURE", partial: "HI" });
    expect(caught).toHaveProperty("message", "transport failed: port unplugged");
  });

  it("ignores abort once stopped", () => {
    const loop = new DecoderLoop(new ArrayLineSource(["END"]));
    loop.run();
    loop.abort(new Error("late"));
    expect(loop.result().reason).toBe("terminated");
  });
});
