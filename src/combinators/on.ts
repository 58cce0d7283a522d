import type { MachineBuilder } from "../builder.js";

/**
 * Register a transition, or the same destination for several symbols.
 *
 * @example
 * ```ts
 * pipe(
 *   Dfa.builder(),
 *   // ...
 *   Dfa.on("Len0", ["a", "b"], "Len1"),
 *   Dfa.on("Len1", "a", "Len2"),
 * )
 * ```
 */
export const on =
  (from: string, symbols: string | ReadonlyArray<string>, to: string) =>
  (builder: MachineBuilder): MachineBuilder => {
    for (const symbol of typeof symbols === "string" ? [symbols] : symbols) {
      builder.addTransition(from, symbol, to);
    }
    return builder;
  };

/**
 * Register a full transition table row by row: `{ S0: { "0": "S0", "1": "S1" } }`.
 * Rows and symbols are registered in object key order.
 */
export const table =
  (rows: Readonly<Record<string, Readonly<Record<string, string>>>>) =>
  (builder: MachineBuilder): MachineBuilder => {
    for (const [from, row] of Object.entries(rows)) {
      for (const [symbol, to] of Object.entries(row)) {
        builder.addTransition(from, symbol, to);
      }
    }
    return builder;
  };
