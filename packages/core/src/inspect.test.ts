import { createCell } from "./cell";
import { createDeduped } from "./deduped";
import { createDerived } from "./derived";
import { createEvent } from "./event";
import { inspect } from "./inspect";

test("inspect", () => {
  const cell = createCell(1);
  expect(inspect(cell)).toEqual({ kind: "cell", value: 1, callbacks: 0 });

  const doubled = createDerived([cell], () => cell.get() * 2);
  const deduped = createDeduped(cell);
  expect(inspect(cell)).toEqual({ kind: "cell", value: 1, callbacks: 2 });
  expect(inspect(doubled)).toEqual({ kind: "derived", value: 2, callbacks: 0 });

  const unsubscribe = deduped.listen(() => {});
  expect(inspect(deduped)).toEqual({ kind: "deduped", value: 1, callbacks: 1 });
  unsubscribe();
  expect(inspect(deduped)).toEqual({ kind: "deduped", value: 1, callbacks: 0 });

  const event = createEvent();
  event.listen(() => {});
  expect(inspect(event)).toEqual({ kind: "event", callbacks: 1 });
});

test("inspect: writable deduped", () => {
  const deduped = createDeduped(createCell("a"));
  deduped.set("b");
  expect(inspect(deduped)).toEqual({ kind: "deduped", value: "b", callbacks: 0 });
});
