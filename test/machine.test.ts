import { Cause, Effect, Either, Exit, Option } from "effect";
import { describe, expect, test } from "vitest";

import {
  Machine,
  MachineBuilder,
  State,
  StateError,
  TransitionError,
  isMachine,
} from "../src/index.js";
import { it } from "./utils/effect-test.js";

/** Binary numbers divisible by three */
const mod3 = () =>
  MachineBuilder.create()
    .withAlphabet(["0", "1"])
    .addState("S0", true)
    .addState("S1")
    .addState("S2")
    .setInitialState("S0")
    .addTransition("S0", "0", "S0")
    .addTransition("S0", "1", "S1")
    .addTransition("S1", "0", "S2")
    .addTransition("S1", "1", "S0")
    .addTransition("S2", "0", "S1")
    .addTransition("S2", "1", "S2")
    .build();

const rejectingStart = () =>
  MachineBuilder.create()
    .withAlphabet(["a"])
    .addState("Start")
    .addState("Done", true)
    .setInitialState("Start")
    .addTransition("Start", "a", "Done")
    .addTransition("Done", "a", "Done")
    .build();

describe("Machine", () => {
  describe("process", () => {
    const machine = mod3();
    const cases: ReadonlyArray<readonly [string, boolean]> = [
      ["", true],
      ["0", true],
      ["1", false],
      ["10", false],
      ["11", true],
      ["110", true],
      ["1001", true],
      ["0011", true],
      ["1010", false],
      ["1111", true],
    ];

    for (const [input, expected] of cases) {
      it.effect(`decides "${input}" -> ${expected}`, () =>
        Effect.gen(function* () {
          expect(yield* machine.process(input)).toBe(expected);
        }),
      );
    }

    it.effect("rejects a symbol outside the alphabet", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(machine.process("1012"));
        expect(error).toBeInstanceOf(TransitionError);
        expect(error.reason).toBe("InvalidSymbol");
        expect(error.symbol).toBe("2");
        expect(error.message).toBe("Invalid input symbol '2'. Valid symbols are: '0', '1'.");
      }),
    );

    it.effect("invalid symbols are caught by tag", () =>
      Effect.gen(function* () {
        const result = yield* machine
          .process("abc")
          .pipe(Effect.catchTag("TransitionError", (e) => Effect.succeed(e.symbol)));
        expect(result).toBe("a");
      }),
    );

    it.effect("is deterministic across repeated calls", () =>
      Effect.gen(function* () {
        const results: boolean[] = [];
        for (let i = 0; i < 3; i++) {
          results.push(yield* machine.process("110"));
          results.push(yield* machine.process("10"));
        }
        expect(results).toEqual([true, false, true, false, true, false]);
      }),
    );

    it.effect("accepts iterables of whole symbols", () =>
      Effect.gen(function* () {
        const words = MachineBuilder.create()
          .withAlphabet(["ping", "pong"])
          .addState("Idle", true)
          .addState("Waiting")
          .setInitialState("Idle")
          .addTransition("Idle", "ping", "Waiting")
          .addTransition("Idle", "pong", "Idle")
          .addTransition("Waiting", "ping", "Waiting")
          .addTransition("Waiting", "pong", "Idle")
          .build();

        expect(yield* words.process(["ping", "pong"])).toBe(true);
        expect(yield* words.process(["ping"])).toBe(false);
        expect(yield* words.process([])).toBe(true);

        const error = yield* Effect.flip(words.process("ping"));
        expect(error.symbol).toBe("p");
      }),
    );
  });

  describe("empty input", () => {
    it.effect("is accepted when the initial state is accepting", () =>
      Effect.gen(function* () {
        expect(yield* mod3().process("")).toBe(true);
      }),
    );

    it.effect("is rejected when the initial state is not accepting", () =>
      Effect.gen(function* () {
        expect(yield* rejectingStart().process("")).toBe(false);
      }),
    );

    it.effect("leaves the cursor at the initial state", () =>
      Effect.gen(function* () {
        const machine = rejectingStart();
        yield* machine.process("a");
        expect(machine.currentState.name).toBe("Done");
        yield* machine.process("");
        expect(machine.currentState.name).toBe("Start");
      }),
    );
  });

  describe("cursor", () => {
    test("starts at the initial state", () => {
      expect(mod3().currentState.name).toBe("S0");
    });

    test("process leaves the final state as current", () => {
      const machine = mod3();
      machine.accepts("10");
      expect(machine.currentState.name).toBe("S2");
    });

    test("each process starts from the initial state", () => {
      const machine = mod3();
      expect(machine.accepts("1")).toBe(false);
      expect(machine.accepts("0")).toBe(true);
      expect(machine.currentState.name).toBe("S0");
    });

    test("reset returns to the initial state", () => {
      const machine = mod3();
      machine.accepts("1");
      expect(machine.currentState.name).toBe("S1");
      machine.reset();
      expect(machine.currentState.name).toBe("S0");
    });

    test("a failed process leaves the cursor at the initial state", () => {
      const machine = mod3();
      machine.accepts("10");
      expect(() => machine.accepts("102")).toThrow(TransitionError);
      expect(machine.currentState.name).toBe("S0");
    });

    it.effect("step advances one symbol at a time", () =>
      Effect.gen(function* () {
        const machine = mod3();
        expect((yield* machine.step("1")).name).toBe("S1");
        expect((yield* machine.step("1")).name).toBe("S0");
        expect((yield* machine.step("0")).name).toBe("S0");
        expect(machine.isAccepting(machine.currentState)).toBe(true);
      }),
    );

    it.effect("a rejected step does not move the cursor", () =>
      Effect.gen(function* () {
        const machine = mod3();
        yield* machine.step("1");
        const error = yield* Effect.flip(machine.step("x"));
        expect(error.reason).toBe("InvalidSymbol");
        expect(machine.currentState.name).toBe("S1");
      }),
    );

    it.effect("concurrent runs do not interfere", () =>
      Effect.gen(function* () {
        const machine = mod3();
        const inputs = ["110", "10", "1001", "1", "11", "0"];
        const results = yield* Effect.forEach(inputs, (input) => machine.process(input), {
          concurrency: "unbounded",
        });
        expect(results).toEqual([true, false, true, false, true, true]);
      }),
    );
  });

  describe("accepts", () => {
    test("returns the decision", () => {
      expect(mod3().accepts("1001")).toBe(true);
      expect(mod3().accepts("10")).toBe(false);
    });

    test("throws the TransitionError itself", () => {
      try {
        mod3().accepts("12");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TransitionError);
        expect(error).toMatchObject({ reason: "InvalidSymbol", symbol: "2" });
      }
    });
  });

  describe("trace", () => {
    it.effect("lists visited states with the initial state first", () =>
      Effect.gen(function* () {
        const path = yield* mod3().trace("110");
        expect(path.map((s) => s.name)).toEqual(["S0", "S1", "S0", "S0"]);
      }),
    );

    it.effect("is just the initial state for empty input", () =>
      Effect.gen(function* () {
        const path = yield* mod3().trace("");
        expect(path.map((s) => s.name)).toEqual(["S0"]);
      }),
    );

    it.effect("does not move the committed cursor", () =>
      Effect.gen(function* () {
        const machine = mod3();
        yield* machine.trace("1");
        expect(machine.currentState.name).toBe("S0");
      }),
    );
  });

  describe("accessors", () => {
    const machine = mod3();

    test("expose the build-time snapshot", () => {
      expect(machine.states.map(String)).toEqual(["S0 (accepting)", "S1", "S2"]);
      expect(machine.alphabet).toEqual(["0", "1"]);
      expect(machine.transitions.map(String)).toEqual([
        "S0 --[0]--> S0",
        "S0 --[1]--> S1",
        "S1 --[0]--> S2",
        "S1 --[1]--> S0",
        "S2 --[0]--> S1",
        "S2 --[1]--> S2",
      ]);
      expect(String(machine.initialState)).toBe("S0 (accepting)");
      expect(machine.acceptingStates.map((s) => s.name)).toEqual(["S0"]);
    });

    test("getState finds registered states", () => {
      expect(machine.getState("S2").name).toBe("S2");
      expect(machine.getState("S0").isAccepting).toBe(true);
    });

    test("getState fails for unknown names", () => {
      expect(() => machine.getState("S9")).toThrow(StateError);
      expect(() => machine.getState("S9")).toThrow("State 'S9' is not defined in the state machine.");
    });

    test("isAccepting compares by name", () => {
      expect(machine.isAccepting(State.make("S0"))).toBe(true);
      expect(machine.isAccepting(State.make("S1", true))).toBe(false);
    });

    it.effect("nextState looks up the table without moving the cursor", () =>
      Effect.gen(function* () {
        expect((yield* machine.nextState(machine.getState("S2"), "0")).name).toBe("S1");
        expect(machine.currentState.name).toBe("S0");
        const error = yield* Effect.flip(machine.nextState(machine.initialState, "7"));
        expect(error.reason).toBe("InvalidSymbol");
      }),
    );

    test("isMachine narrows unknown values", () => {
      expect(isMachine(machine)).toBe(true);
      expect(isMachine({ states: machine.states, initialState: machine.initialState })).toBe(false);
    });

    test("renders a summary", () => {
      expect(String(machine)).toBe("Machine(3 states, alphabet: [0, 1], initial: S0)");
    });
  });

  describe("single-state machine", () => {
    const loop = MachineBuilder.create()
      .withAlphabet(["a", "b"])
      .addState("Only", true)
      .setInitialState("Only")
      .addTransition("Only", "a", "Only")
      .addTransition("Only", "b", "Only")
      .build();

    test("accepts everything over its alphabet", () => {
      for (const input of ["", "a", "b", "abba", "bbbbbb"]) {
        expect(loop.accepts(input)).toBe(true);
      }
    });
  });

  describe("missing table entries", () => {
    test("surface as a NotDefined defect, not a typed failure", () => {
      const a = State.make("A", true);
      const broken = new Machine({
        states: [a],
        alphabet: ["x"],
        transitions: [],
        index: new Map(),
        initialState: a,
      });

      const exit = Effect.runSyncExit(broken.process("x"));
      expect(Exit.isFailure(exit)).toBe(true);
      if (Exit.isFailure(exit)) {
        expect(Option.isNone(Cause.failureOption(exit.cause))).toBe(true);
        const defect = Cause.dieOption(exit.cause);
        expect(Option.isSome(defect)).toBe(true);
        if (Option.isSome(defect)) {
          expect(defect.value).toBeInstanceOf(TransitionError);
          expect(defect.value).toMatchObject({ reason: "NotDefined", state: "A", symbol: "x" });
        }
      }

      expect(Either.isRight(Effect.runSync(Effect.either(broken.process(""))))).toBe(true);
    });
  });
});
