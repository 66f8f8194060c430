import { Emitter } from "./contracts";
import { Inspectable, inspectSymbol } from "./inspect";
import { createRegistry } from "./registry";

export interface Event extends Emitter, Inspectable {
  /**
   * Runs every registered listener once.
   */
  dispatch: () => void;
}

export const createEvent = (): Event => {
  const registry = createRegistry<undefined>();
  return {
    listen: (callback) => registry.add({ type: "listener", callback }),
    dispatch: () => {
      registry.notify(undefined);
    },
    [inspectSymbol]: () => ({ kind: "event", callbacks: registry.size() }),
  };
};
