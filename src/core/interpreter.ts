import type { AssemblyBuffer } from "./buffer";
import { parseFrame } from "./frame";
import type { SubstitutionRotor } from "./rotor";
import type { Dispatch, Frame } from "./types";

/* ── frame-level reducer ─────────────────────────────────── */
export const applyFrame = (
  frame: Frame,
  rotor: SubstitutionRotor,
  buffer: AssemblyBuffer,
): Dispatch => {
  switch (frame.type) {
    case "data": {
      const decoded = rotor.map(frame.symbol);
      buffer.append(decoded);
      return { signal: "continue", frame, decoded };
    }
    case "remap":
      rotor.rotate(frame.delta);
      return { signal: "continue", frame };
    case "terminate":
      return { signal: "stop", frame };
  }
};

/**
 * Parse one line and apply it. A malformed line leaves rotor and buffer
 * untouched and never stops decoding.
 */
export const interpret = (
  line: string,
  rotor: SubstitutionRotor,
  buffer: AssemblyBuffer,
): Dispatch => {
  const parsed = parseFrame(line);
  if (!parsed.ok) return { signal: "continue", error: parsed.error };
  return applyFrame(parsed.frame, rotor, buffer);
};
