import { Emitter, Readable } from "./contracts";
import { Inspectable, inspectSymbol } from "./inspect";
import { Registry, createRegistry } from "./registry";

export interface ReadableStore<Value>
  extends Emitter,
    Readable<Value>,
    Inspectable {}

/**
 * The part shared by cells, derived and deduped stores: a registry plus the
 * `get`/`subscribe`/`listen` trio reading through `read`.
 */
export const createReadableStore = <Value>(
  kind: "cell" | "derived" | "deduped",
  read: () => Value
): { store: ReadableStore<Value>; registry: Registry<Value> } => {
  const registry = createRegistry<Value>();
  const store: ReadableStore<Value> = {
    get: read,
    subscribe: (callback) => {
      callback(read());
      return registry.add({ type: "subscriber", callback });
    },
    listen: (callback) => registry.add({ type: "listener", callback }),
    [inspectSymbol]: () => ({ kind, value: read(), callbacks: registry.size() }),
  };
  return { store, registry };
};
