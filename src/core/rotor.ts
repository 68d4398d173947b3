import { asShift, type Letter, type Shift } from "../types/brands";

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const A = 65;

const isLetter = (c: string): c is Letter => c.length === 1 && /[A-Za-z]/.test(c);

/**
 * Caesar wheel over A..Z. The ring itself never moves; only the tracked
 * shift changes, so a lookup is one modular addition.
 *
 * Letters always come out uppercase. Anything else passes through.
 */
export class SubstitutionRotor {
  private _shift: Shift = asShift(0);

  get shift(): Shift {
    return this._shift;
  }

  /** Accepts any integer; whole revolutions are dropped. */
  rotate(delta: number): void {
    this._shift = asShift(this._shift + (delta % 26));
  }

  map(symbol: string): string {
    if (!isLetter(symbol)) return symbol;
    const index = symbol.toUpperCase().charCodeAt(0) - A;
    return ALPHABET.charAt((index + this._shift) % 26);
  }
}
