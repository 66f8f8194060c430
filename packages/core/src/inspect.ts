export const inspectSymbol = Symbol("inspect");

export type Inspection =
  | { kind: "cell" | "derived" | "deduped"; value: unknown; callbacks: number }
  | { kind: "event"; callbacks: number };

export interface Inspectable {
  [inspectSymbol]: () => Inspection;
}

/**
 * Returns what a store currently holds and how many callbacks are registered
 * on it. Meant for debugging.
 */
export const inspect = (store: Inspectable): Inspection => store[inspectSymbol]();
