/**
 * Removes the callback it was returned for. Calling it more than once is a
 * no-op.
 */
export type Unsubscribe = () => void;

/**
 * Something that can tell you that it has changed.
 */
export interface Emitter {
  /**
   * Registers a callback that is run on every change, but not at registration
   * time.
   */
  listen: (callback: () => void) => Unsubscribe;
}

export interface Readable<Value> {
  get: () => Value;
  /**
   * Runs the callback with the current value before returning, and then with
   * the new value on every change.
   */
  subscribe: (callback: (value: Value) => void) => Unsubscribe;
}

export interface Writable<Value> {
  /**
   * Replaces the value and notifies, even if the new value is the same as the
   * old one.
   */
  set: (value: Value) => void;
  update: (updater: (value: Value) => Value) => void;
}

export const isEmitter = (value: unknown): value is Emitter =>
  typeof value === "object" &&
  value !== null &&
  "listen" in value &&
  typeof value.listen === "function";

export const isReadable = <Value = unknown>(
  value: unknown
): value is Readable<Value> =>
  typeof value === "object" &&
  value !== null &&
  "get" in value &&
  typeof value.get === "function" &&
  "subscribe" in value &&
  typeof value.subscribe === "function";

export const isWritable = <Value>(
  store: Readable<Value>
): store is Readable<Value> & Writable<Value> =>
  "set" in store &&
  typeof store.set === "function" &&
  "update" in store &&
  typeof store.update === "function";
