import { createCell } from "./cell";
import { Emitter, Readable, Writable, isWritable } from "./contracts";
import { ReadableStore, createReadableStore } from "./store";

export type Deduped<Value> = ReadableStore<Value>;

export interface WritableDeduped<Value>
  extends Deduped<Value>,
    Writable<Value> {}

/**
 * Mirrors `source` but only notifies when the value has actually changed
 * according to `isEqual`. If `source` is writable, so is the result, and
 * writes go straight to `source`: the mirrored value only changes once
 * `source` notifies.
 *
 * The default `isEqual` is `Object.is`, which compares objects and arrays by
 * identity: setting a new object with the same contents still notifies. Pass
 * your own `isEqual` for structured values.
 */
export function createDeduped<Value>(
  source: Emitter & Readable<Value> & Writable<Value>,
  isEqual?: (a: Value, b: Value) => boolean
): WritableDeduped<Value>;
export function createDeduped<Value>(
  source: Emitter & Readable<Value>,
  isEqual?: (a: Value, b: Value) => boolean
): Deduped<Value>;
export function createDeduped<Value>(
  source: Emitter & Readable<Value>,
  isEqual: (a: Value, b: Value) => boolean = Object.is
): Deduped<Value> | WritableDeduped<Value> {
  let shadow = source.get();
  const { store, registry } = createReadableStore("deduped", () => shadow);
  source.subscribe((value) => {
    if (!isEqual(shadow, value)) {
      shadow = value;
      registry.notify(value);
    }
  });
  if (isWritable(source)) {
    return {
      ...store,
      set: (value: Value) => {
        source.set(value);
      },
      update: (updater: (value: Value) => Value) => {
        source.update(updater);
      },
    };
  }
  return store;
}

export const createDedupedCell = <Value>(
  value: Value,
  isEqual?: (a: Value, b: Value) => boolean
): WritableDeduped<Value> => createDeduped(createCell(value), isEqual);
