import { Unsubscribe } from "./contracts";
import { getCurrentScope, onDispose, runOutsideScope } from "./scope";

/**
 * A listener is run with no arguments, a subscriber gets the new value.
 */
export type Callback<Value> =
  | { type: "listener"; callback: () => void }
  | { type: "subscriber"; callback: (value: Value) => void };

export interface Registry<Value> {
  add: (callback: Callback<Value>) => Unsubscribe;
  /**
   * Runs the callbacks that were registered when the call started and are
   * still registered when their turn comes. The order in which they run is not
   * part of the contract.
   */
  notify: (value: Value) => void;
  /**
   * Whether a `notify` call is in progress, possibly several levels up the
   * call stack.
   */
  isNotifying: () => boolean;
  size: () => number;
}

export const createRegistry = <Value>(): Registry<Value> => {
  const callbacks = new Map<number, Callback<Value>>();
  // Ids are never reused, otherwise a stale unsubscribe handle could remove a
  // callback registered later.
  let nextId = 0;
  let notifyDepth = 0;

  return {
    add: (callback) => {
      const id = nextId++;
      callbacks.set(id, callback);
      let removeFromScope: (() => void) | undefined;
      const unsubscribe = () => {
        callbacks.delete(id);
        removeFromScope?.();
      };
      if (getCurrentScope()) {
        removeFromScope = onDispose(unsubscribe);
      }
      return unsubscribe;
    },
    notify: (value) => {
      const snapshot = [...callbacks];
      notifyDepth++;
      try {
        // Callbacks belong to whoever registered them, not to the scope of
        // the writer that set off this notification.
        runOutsideScope(() => {
          for (const [id, entry] of snapshot) {
            if (callbacks.has(id)) {
              if (entry.type === "subscriber") {
                entry.callback(value);
              } else {
                entry.callback();
              }
            }
          }
        });
      } finally {
        notifyDepth--;
      }
    },
    isNotifying: () => notifyDepth > 0,
    size: () => callbacks.size,
  };
};
