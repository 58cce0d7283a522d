import type { MachineBuilder } from "../builder.js";

/**
 * Set the alphabet of a builder.
 *
 * @example
 * ```ts
 * pipe(Dfa.builder(), Dfa.alphabet(["a", "b"]))
 * ```
 */
export const alphabet =
  (symbols: Iterable<string>) =>
  (builder: MachineBuilder): MachineBuilder =>
    builder.withAlphabet(symbols);
