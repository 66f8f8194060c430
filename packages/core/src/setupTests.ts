import { noopLog, resetLog } from "@1log/core";
import { getLogFunction } from "@1log/function";
import { jestPlugin, readLog } from "@1log/jest";

export const log = noopLog.add(jestPlugin());
export const logFunction = getLogFunction(log);

afterEach(() => {
  if (readLog().length) {
    throw new Error("Log expected to be empty at the end of each test.");
  }
  resetLog();
});

/**
 * Lets other tasks run, the way a thread switch would.
 */
export const yieldToOtherTasks = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

export const hasSymbol = (object: object, name: string): boolean =>
  Reflect.ownKeys(object).some(
    (symbol) => symbol.toString() === `Symbol(${name})`
  );
