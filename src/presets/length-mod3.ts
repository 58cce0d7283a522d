import { pipe } from "effect";

import { MachineBuilder } from "../builder.js";
import { alphabet } from "../combinators/alphabet.js";
import { on } from "../combinators/on.js";
import { accepting, initial, state } from "../combinators/state.js";
import type { Machine } from "../machine.js";

/** Strings over `{a, b}` whose length is a multiple of three */
export const lengthMod3 = (): Machine =>
  pipe(
    MachineBuilder.create(),
    alphabet(["a", "b"]),
    accepting("Len0"),
    state("Len1"),
    state("Len2"),
    initial("Len0"),
    on("Len0", ["a", "b"], "Len1"),
    on("Len1", ["a", "b"], "Len2"),
    on("Len2", ["a", "b"], "Len0"),
  ).build();
