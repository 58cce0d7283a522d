/**
 * Typed error classes for effect-dfa.
 *
 * All errors extend Schema.TaggedError for:
 * - Type-safe catching via Effect.catchTag
 * - Serialization support
 * - Yielding directly inside Effect.gen
 *
 * Each class carries a `reason` literal so callers can tell failures of the
 * same family apart without parsing messages.
 *
 * @module
 */
import { Schema } from "effect";

const quoted = (symbols: ReadonlyArray<string>): string => symbols.map((s) => `'${s}'`).join(", ");

// ============================================================================
// ConfigurationError
// ============================================================================

/** Machine cannot be built, or the builder was already consumed */
export class ConfigurationError extends Schema.TaggedError<ConfigurationError>()(
  "ConfigurationError",
  {
    reason: Schema.Literal(
      "NoStates",
      "EmptyAlphabet",
      "NoInitialState",
      "IncompleteTransitions",
      "AlreadyBuilt",
    ),
    message: Schema.String,
    state: Schema.optional(Schema.String),
    missingSymbols: Schema.optional(Schema.Array(Schema.String)),
  },
) {
  static noStates(): ConfigurationError {
    return new ConfigurationError({
      reason: "NoStates",
      message: "State machine must have at least one state defined.",
    });
  }

  static emptyAlphabet(): ConfigurationError {
    return new ConfigurationError({
      reason: "EmptyAlphabet",
      message: "State machine must have at least one symbol in its alphabet.",
    });
  }

  static noInitialState(): ConfigurationError {
    return new ConfigurationError({
      reason: "NoInitialState",
      message: "State machine must have an initial state defined.",
    });
  }

  static incompleteTransitions(
    state: string,
    missingSymbols: ReadonlyArray<string>,
  ): ConfigurationError {
    return new ConfigurationError({
      reason: "IncompleteTransitions",
      message:
        `Incomplete DFA: state '${state}' is missing transitions for symbols: ` +
        `${quoted(missingSymbols)}.`,
      state,
      missingSymbols,
    });
  }

  static alreadyBuilt(): ConfigurationError {
    return new ConfigurationError({
      reason: "AlreadyBuilt",
      message: "Builder has already been consumed; the machine it built is immutable.",
    });
  }
}

// ============================================================================
// StateError
// ============================================================================

/** A state name does not resolve, collides, or is blank */
export class StateError extends Schema.TaggedError<StateError>()("StateError", {
  reason: Schema.Literal("Undefined", "Duplicate", "EmptyName"),
  message: Schema.String,
  stateName: Schema.String,
}) {
  static undefinedState(name: string): StateError {
    return new StateError({
      reason: "Undefined",
      message: `State '${name}' is not defined in the state machine.`,
      stateName: name,
    });
  }

  static duplicate(name: string): StateError {
    return new StateError({
      reason: "Duplicate",
      message: `State '${name}' already exists in the state machine.`,
      stateName: name,
    });
  }

  static emptyName(name: string): StateError {
    return new StateError({
      reason: "EmptyName",
      message: "State name cannot be empty.",
      stateName: name,
    });
  }
}

// ============================================================================
// TransitionError
// ============================================================================

/** A transition collides at configuration time, or a symbol is unusable at run time */
export class TransitionError extends Schema.TaggedError<TransitionError>()("TransitionError", {
  reason: Schema.Literal("Duplicate", "InvalidSymbol", "NotDefined"),
  message: Schema.String,
  symbol: Schema.String,
  state: Schema.optional(Schema.String),
}) {
  static duplicate(state: string, symbol: string): TransitionError {
    return new TransitionError({
      reason: "Duplicate",
      message:
        `Transition already exists from state '${state}' with input symbol '${symbol}'. ` +
        "Each state-symbol pair must have exactly one transition.",
      symbol,
      state,
    });
  }

  static invalidSymbol(symbol: string, alphabet: ReadonlyArray<string>): TransitionError {
    return new TransitionError({
      reason: "InvalidSymbol",
      message: `Invalid input symbol '${symbol}'. Valid symbols are: ${quoted(alphabet)}.`,
      symbol,
    });
  }

  /** Raised as a defect: a validated machine never reaches it */
  static notDefined(state: string, symbol: string): TransitionError {
    return new TransitionError({
      reason: "NotDefined",
      message: `No transition defined from state '${state}' with input symbol '${symbol}'.`,
      symbol,
      state,
    });
  }
}

/** Assertion failed in testing utilities */
export class AssertionError extends Schema.TaggedError<AssertionError>()("AssertionError", {
  message: Schema.String,
}) {}
