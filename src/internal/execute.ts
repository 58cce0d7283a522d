/**
 * Execution core shared by Machine.process, Machine.step and the testing
 * helpers. The cursor is a local of `run`, so concurrent runs against the
 * same table never interleave.
 *
 * @internal
 */
import { Effect } from "effect";

import { TransitionError } from "../errors.js";
import type { State } from "../state.js";
import type { TransitionIndex } from "./transition-index.js";
import { findDestination } from "./transition-index.js";

/**
 * Frozen lookup data for a built machine.
 */
export interface ExecutionTable {
  readonly alphabet: ReadonlyArray<string>;
  readonly symbols: ReadonlySet<string>;
  readonly index: TransitionIndex;
}

/**
 * Hooks called while a run advances. Both run synchronously before the
 * cursor moves on.
 */
export interface RunObserver {
  readonly onStep?: (from: State, symbol: string, to: State) => Effect.Effect<void>;
  readonly onRejectSymbol?: (state: State, symbol: string) => Effect.Effect<void>;
}

/**
 * Split caller input into symbols. Strings split per UTF-16 code unit;
 * iterables supply whole tokens.
 */
export const toSymbols = (input: string | Iterable<string>): ReadonlyArray<string> =>
  typeof input === "string" ? input.split("") : Array.from(input);

/**
 * Resolve the destination of a single transition.
 *
 * A symbol outside the alphabet fails with `InvalidSymbol`. A missing table
 * entry means the completeness check was bypassed and dies with `NotDefined`.
 */
export const resolveStep = (
  table: ExecutionTable,
  from: State,
  symbol: string,
): Effect.Effect<State, TransitionError> => {
  if (!table.symbols.has(symbol)) {
    return Effect.fail(TransitionError.invalidSymbol(symbol, table.alphabet));
  }
  const to = findDestination(table.index, from.name, symbol);
  if (to === undefined) {
    return Effect.die(TransitionError.notDefined(from.name, symbol));
  }
  return Effect.succeed(to);
};

/**
 * Run `symbols` from `start` and return the state the cursor ends in.
 * An empty sequence returns `start` untouched.
 */
export const run = (
  table: ExecutionTable,
  start: State,
  symbols: ReadonlyArray<string>,
  observer: RunObserver = {},
): Effect.Effect<State, TransitionError> =>
  Effect.gen(function* () {
    let cursor = start;
    for (const symbol of symbols) {
      const onRejectSymbol = observer.onRejectSymbol;
      const next = yield* resolveStep(table, cursor, symbol).pipe(
        Effect.tapError((error) =>
          error.reason === "InvalidSymbol" && onRejectSymbol !== undefined
            ? onRejectSymbol(cursor, symbol)
            : Effect.void,
        ),
      );
      if (observer.onStep !== undefined) {
        yield* observer.onStep(cursor, symbol, next);
      }
      cursor = next;
    }
    return cursor;
  });
