import { z } from "zod";
import { defineQuery, defineUpdate, transition, type Acidic } from "@acid-handle/core";

export type Counter = { value: number };

const amount = z.number().finite();

export const add = defineUpdate({
  tag: "add",
  args: amount,
  apply: (s: Counter, n) => transition({ value: s.value + n }, s.value + n),
});

export const multiply = defineUpdate({
  tag: "multiply",
  args: amount,
  apply: (s: Counter, n) => transition({ value: s.value * n }, s.value * n),
});

export const divide = defineUpdate({
  tag: "divide",
  args: amount,
  apply: (s: Counter, n) => {
    if (n === 0) throw new RangeError("division by zero");
    return transition({ value: s.value / n }, s.value / n);
  },
});

/** Reset to zero; the result is the value before the reset. */
export const reset = defineUpdate({
  tag: "reset",
  args: z.undefined(),
  apply: (s: Counter) => transition({ value: 0 }, s.value),
});

export const get = defineQuery({
  tag: "get",
  args: z.undefined(),
  run: (s: Counter) => s.value,
});

export const counter: Acidic<Counter> = {
  name: "counter",
  initial: () => ({ value: 0 }),
  state: z.object({ value: z.number() }),
  methods: [add, multiply, divide, reset, get],
};
