import { Effect } from "effect";

import { AssertionError, type TransitionError } from "./errors.js";
import type { Input, Machine } from "./machine.js";
import type { State } from "./state.js";

/**
 * Result of simulating an input through a machine
 */
export interface SimulationResult {
  readonly states: ReadonlyArray<State>;
  readonly finalState: State;
  readonly accepted: boolean;
}

/**
 * Simulate an input without touching the machine's committed cursor.
 * Useful for testing transition tables in isolation.
 *
 * @example
 * ```ts
 * const result = yield* simulate(Presets.mod3(), "110")
 *
 * expect(result.accepted).toBe(true)
 * expect(result.states.map((s) => s.name)).toEqual(["S0", "S1", "S0", "S0"])
 * ```
 */
export const simulate = (
  machine: Machine,
  input: Input,
): Effect.Effect<SimulationResult, TransitionError> =>
  Effect.gen(function* () {
    const states = yield* machine.trace(input);
    const finalState = states[states.length - 1] ?? machine.initialState;
    return { states, finalState, accepted: machine.isAccepting(finalState) };
  });

const describePath = (states: ReadonlyArray<State>): string =>
  states.map((s) => s.name).join(" -> ");

/** Iterables may be single-pass; read them once so messages can echo the input */
const materialize = (input: Input): string | ReadonlyArray<string> =>
  typeof input === "string" ? input : Array.from(input);

const render = (input: string | ReadonlyArray<string>): string =>
  typeof input === "string" ? `"${input}"` : `[${input.join(", ")}]`;

/**
 * Assert that a machine accepts the given input
 */
export const assertAccepts = (
  machine: Machine,
  input: Input,
): Effect.Effect<State, AssertionError | TransitionError> =>
  Effect.gen(function* () {
    const symbols = materialize(input);
    const result = yield* simulate(machine, symbols);
    if (!result.accepted) {
      return yield* new AssertionError({
        message:
          `Expected ${render(symbols)} to be accepted but it ended in "${result.finalState.name}". ` +
          `States visited: ${describePath(result.states)}`,
      });
    }
    return result.finalState;
  });

/**
 * Assert that a machine rejects the given input
 */
export const assertRejects = (
  machine: Machine,
  input: Input,
): Effect.Effect<State, AssertionError | TransitionError> =>
  Effect.gen(function* () {
    const symbols = materialize(input);
    const result = yield* simulate(machine, symbols);
    if (result.accepted) {
      return yield* new AssertionError({
        message:
          `Expected ${render(symbols)} to be rejected but it ended in accepting "${result.finalState.name}". ` +
          `States visited: ${describePath(result.states)}`,
      });
    }
    return result.finalState;
  });

/**
 * Assert that a machine follows a specific path of state names
 */
export const assertPath = (
  machine: Machine,
  input: Input,
  expectedPath: ReadonlyArray<string>,
): Effect.Effect<void, AssertionError | TransitionError> =>
  Effect.gen(function* () {
    const result = yield* simulate(machine, input);
    const actualPath = result.states.map((s) => s.name);

    if (actualPath.length !== expectedPath.length) {
      return yield* new AssertionError({
        message:
          `Path length mismatch. Expected ${expectedPath.length} states but got ${actualPath.length}.\n` +
          `Expected: ${expectedPath.join(" -> ")}\n` +
          `Actual:   ${actualPath.join(" -> ")}`,
      });
    }

    for (let i = 0; i < expectedPath.length; i++) {
      if (actualPath[i] !== expectedPath[i]) {
        return yield* new AssertionError({
          message:
            `Path mismatch at position ${i}. Expected "${expectedPath[i]}" but got "${actualPath[i]}".\n` +
            `Expected: ${expectedPath.join(" -> ")}\n` +
            `Actual:   ${actualPath.join(" -> ")}`,
        });
      }
    }
  });
