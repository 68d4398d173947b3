// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Shift = Brand<number, "Shift">;
export type Letter = Brand<string, "Letter">;

/** Reduce any integer to its representative in [0, 26). */
export const asShift = (n: number): Shift => ((((n % 26) + 26) % 26) as Shift);
