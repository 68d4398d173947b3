import { MalformedFrameError } from "./errors";
import type { Frame, ParseResult } from "./types";

export const DATA_PREFIX = "L,";
export const REMAP_PREFIX = "M,";
export const TERMINATOR = "END";
export const SPACE_TOKEN = "Space";

const ok = (frame: Frame): ParseResult => ({ ok: true, frame });
const bad = (line: string, reason: string): ParseResult => ({
  ok: false,
  error: new MalformedFrameError(line, reason),
});

const ZERO = 48;

/**
 * Decimal integer with an optional leading `-`. Digits are folded by hand
 * so `+5`, ` 5`, `5.0` and `1e3` are all rejected. Magnitudes past the
 * safe integer range come back as their residue mod 26, which rotates
 * the wheel identically.
 */
export function parseSignedInt(text: string): number | null {
  const negative = text.startsWith("-");
  const digits = negative ? text.slice(1) : text;
  if (digits.length === 0) return null;

  let value = 0;
  let folded = false;
  for (let i = 0; i < digits.length; i++) {
    const d = digits.charCodeAt(i) - ZERO;
    if (d < 0 || d > 9) return null;
    if (folded) {
      value = (value * 10 + d) % 26;
    } else if (value > (Number.MAX_SAFE_INTEGER - d) / 10) {
      folded = true;
      value = ((value % 26) * 10 + d) % 26;
    } else {
      value = value * 10 + d;
    }
  }
  return negative ? -value : value;
}

export function parseFrame(line: string): ParseResult {
  if (line === TERMINATOR) return ok({ type: "terminate" });

  if (line.startsWith(DATA_PREFIX)) {
    const payload = line.slice(DATA_PREFIX.length);
    if (payload === SPACE_TOKEN) return ok({ type: "data", symbol: " " });
    if (payload.length === 0) return bad(line, "missing data payload");
    if (payload.length > 1) return bad(line, "data payload must be one character");
    return ok({ type: "data", symbol: payload });
  }

  if (line.startsWith(REMAP_PREFIX)) {
    const arg = line.slice(REMAP_PREFIX.length);
    if (arg.length === 0) return bad(line, "missing remap argument");
    const delta = parseSignedInt(arg);
    if (delta === null) return bad(line, "remap argument is not a decimal integer");
    return ok({ type: "remap", delta });
  }

  return bad(line, "unrecognized frame");
}

/** Wire form of a frame, as it would appear on the line. */
export const describeFrame = (frame: Frame): string => {
  switch (frame.type) {
    case "data":
      return DATA_PREFIX + (frame.symbol === " " ? SPACE_TOKEN : frame.symbol);
    case "remap":
      return REMAP_PREFIX + (Object.is(frame.delta, -0) ? "-0" : String(frame.delta));
    case "terminate":
      return TERMINATOR;
  }
};
