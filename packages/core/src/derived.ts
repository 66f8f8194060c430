import { Emitter } from "./contracts";
import { ReadableStore, createReadableStore } from "./store";

export type Derived<Value> = ReadableStore<Value>;

/**
 * Creates a read-only store holding the result of `compute`. `compute` is run
 * once right away, and then again every time one of `sources` emits, each
 * time followed by a notification. Nothing is coalesced: two upstream changes
 * mean two runs of `compute` and two notifications.
 *
 * `compute` reads whatever it needs on its own, typically by calling `get` on
 * the same stores that are listed in `sources`.
 */
export const createDerived = <Value>(
  sources: readonly [Emitter, ...Emitter[]],
  compute: () => Value
): Derived<Value> => {
  if (sources.length === 0) {
    throw new Error("A derived store needs at least one source.");
  }
  let value = compute();
  const { store, registry } = createReadableStore("derived", () => value);
  for (const source of sources) {
    source.listen(() => {
      value = compute();
      registry.notify(value);
    });
  }
  return store;
};
