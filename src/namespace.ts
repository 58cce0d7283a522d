/**
 * Dfa namespace - builder entry points and pipeable configuration.
 *
 * @example
 * ```ts
 * import { Effect, pipe } from "effect"
 * import { Dfa } from "effect-dfa"
 *
 * const lengthMod3 = pipe(
 *   Dfa.builder(),
 *   Dfa.alphabet(["a", "b"]),
 *   Dfa.accepting("Len0"),
 *   Dfa.state("Len1"),
 *   Dfa.state("Len2"),
 *   Dfa.initial("Len0"),
 *   Dfa.on("Len0", ["a", "b"], "Len1"),
 *   Dfa.on("Len1", ["a", "b"], "Len2"),
 *   Dfa.on("Len2", ["a", "b"], "Len0"),
 *   Dfa.build,
 * )
 *
 * Effect.runSync(lengthMod3.process("aba")) // true
 * ```
 *
 * @module
 */
import { MachineBuilder } from "./builder.js";
import type { Machine } from "./machine.js";

/** Start a fresh, single-use builder */
export const builder = (): MachineBuilder => MachineBuilder.create();

/** Validate and consume a builder (pipeable) */
export const build = (self: MachineBuilder): Machine => self.build();

/** Validate and consume a builder as an Effect (pipeable) */
export const buildEffect = (self: MachineBuilder) => self.buildEffect();

export { alphabet } from "./combinators/alphabet.js";
export { accepting, initial, state } from "./combinators/state.js";
export { on, table } from "./combinators/on.js";

export { MachineBuilder } from "./builder.js";
export type { Input, Machine } from "./machine.js";
