import type { MachineBuilder } from "../builder.js";

/**
 * Register a state. Use {@link accepting} for accepting states.
 *
 * @example
 * ```ts
 * pipe(
 *   Dfa.builder(),
 *   Dfa.alphabet(["0", "1"]),
 *   Dfa.accepting("Even"),
 *   Dfa.state("Odd"),
 *   Dfa.initial("Even"),
 * )
 * ```
 */
export const state =
  (name: string, isAccepting = false) =>
  (builder: MachineBuilder): MachineBuilder =>
    builder.addState(name, isAccepting);

/** Register an accepting state */
export const accepting = (name: string) => state(name, true);

/** Designate the initial state */
export const initial =
  (name: string) =>
  (builder: MachineBuilder): MachineBuilder =>
    builder.setInitialState(name);
