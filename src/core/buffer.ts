/** Append-only record of decoded symbols, in arrival order. */
export class AssemblyBuffer {
  private readonly symbols: string[] = [];

  append(symbol: string): void {
    this.symbols.push(symbol);
  }

  render(): readonly string[] {
    return [...this.symbols];
  }

  get length(): number {
    return this.symbols.length;
  }

  toString(): string {
    return this.symbols.join("");
  }
}
