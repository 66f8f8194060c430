export { createCell } from "./cell";
export type { Cell } from "./cell";
export { isEmitter, isReadable, isWritable } from "./contracts";
export type { Emitter, Readable, Unsubscribe, Writable } from "./contracts";
export { createDeduped, createDedupedCell } from "./deduped";
export type { Deduped, WritableDeduped } from "./deduped";
export { createDerived } from "./derived";
export type { Derived } from "./derived";
export { createEvent } from "./event";
export type { Event } from "./event";
export { inspect } from "./inspect";
export type { Inspectable, Inspection } from "./inspect";
export {
  createScope,
  disposeScope,
  isScopeDisposed,
  isScopeRunning,
  onDispose,
  runInScope,
  runOutsideScope,
} from "./scope";
export type { Scope } from "./scope";
export type { ReadableStore } from "./store";
