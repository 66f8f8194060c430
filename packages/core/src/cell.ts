import { Writable } from "./contracts";
import { ReadableStore, createReadableStore } from "./store";

export interface Cell<Value> extends ReadableStore<Value>, Writable<Value> {}

export const createCell = <Value>(value: Value): Cell<Value> => {
  const { store, registry } = createReadableStore("cell", () => value);

  const set = (newValue: Value) => {
    if (registry.isNotifying()) {
      throw new Error(
        "You cannot write to a store while it is notifying its callbacks."
      );
    }
    value = newValue;
    registry.notify(newValue);
  };

  return {
    ...store,
    set,
    // Nothing can run between reading and writing, so concurrent updates are
    // never lost.
    update: (updater) => {
      set(updater(value));
    },
  };
};
