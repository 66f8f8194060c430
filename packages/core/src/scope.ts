const parentSymbol = Symbol("parent");
const childrenSymbol = Symbol("children");
const runningSymbol = Symbol("running");
const disposedSymbol = Symbol("disposed");
const disposablesSymbol = Symbol("disposables");

/**
 * An owner of registrations. Every callback registered on a store while a
 * scope is running is unregistered when the scope is disposed, and so is every
 * disposable passed to `onDispose`. Child scopes are disposed together with
 * their parent.
 */
export interface Scope {
  [parentSymbol]?: Scope;
  [childrenSymbol]?: Set<Scope>;
  [runningSymbol]?: true;
  [disposedSymbol]?: true;
  [disposablesSymbol]?: Set<() => void>;
}

let currentScope: Scope | undefined;

export const getCurrentScope = (): Scope | undefined => currentScope;

export const createScope = (): Scope => {
  const newScope: Scope = {};
  if (currentScope) {
    newScope[parentSymbol] = currentScope;
    if (currentScope[childrenSymbol]) {
      currentScope[childrenSymbol].add(newScope);
    } else {
      currentScope[childrenSymbol] = new Set([newScope]);
    }
  }
  return newScope;
};

/**
 * Registers `disposable` on the current scope. The returned function takes it
 * back off without running it.
 */
export const onDispose = (disposable: () => void): (() => void) => {
  const scope = currentScope;
  if (!scope) {
    throw new Error("`onDispose` must be called within a `Scope`.");
  }
  // Wrapped so that the same function can be registered more than once.
  const entry = () => {
    disposable();
  };
  const disposables = scope[disposablesSymbol];
  if (disposables) {
    disposables.add(entry);
  } else {
    scope[disposablesSymbol] = new Set([entry]);
  }
  return () => {
    const disposables = scope[disposablesSymbol];
    if (disposables) {
      disposables.delete(entry);
      if (!disposables.size) {
        delete scope[disposablesSymbol];
      }
    }
  };
};

/**
 * Runs `callback` with no current scope, so that nothing it registers is
 * owned by the scope of whoever called us.
 */
export const runOutsideScope = <T>(callback: () => T): T => {
  const outerScope = currentScope;
  currentScope = undefined;
  try {
    return callback();
  } finally {
    currentScope = outerScope;
  }
};

/**
 * Marks `scope` and its descendants as disposed and runs their disposables,
 * children first, each list in reverse order of registration. Errors are
 * collected so that one failing disposable does not keep the others from
 * running.
 */
const runDisposables = (scope: Scope, errors: unknown[]) => {
  scope[disposedSymbol] = true;
  if (scope[childrenSymbol]) {
    for (const child of [...scope[childrenSymbol]].reverse()) {
      runDisposables(child, errors);
    }
    delete scope[childrenSymbol];
  }
  const disposables = scope[disposablesSymbol];
  if (disposables) {
    delete scope[disposablesSymbol];
    for (const disposable of [...disposables].reverse()) {
      try {
        disposable();
      } catch (error) {
        errors.push(error);
      }
    }
  }
};

export const disposeScope = (scope: Scope): void => {
  if (disposedSymbol in scope) {
    throw new Error("The scope is already disposed.");
  }
  if (runningSymbol in scope) {
    throw new Error(
      "You cannot dispose a scope while a callback is running in that scope."
    );
  }
  const errors: unknown[] = [];
  runOutsideScope(() => {
    runDisposables(scope, errors);
  });
  scope[parentSymbol]?.[childrenSymbol]?.delete(scope);
  if (errors.length === 1) {
    throw errors[0];
  }
  if (errors.length > 1) {
    throw new AggregateError(errors, "Several disposables threw an error.");
  }
};

export const runInScope = <T>(scope: Scope, callback: () => T): T => {
  if (disposedSymbol in scope) {
    throw new Error("You cannot run a callback in a disposed scope.");
  }
  if (runningSymbol in scope) {
    throw new Error(
      "In a nested `runInScope` call, you cannot use the same scope or an ancestor scope."
    );
  }
  let nearestRunningAncestor: Scope | undefined = scope;
  do {
    nearestRunningAncestor[runningSymbol] = true;
    nearestRunningAncestor = nearestRunningAncestor[parentSymbol];
  } while (
    nearestRunningAncestor &&
    !(runningSymbol in nearestRunningAncestor)
  );
  const outerScope = currentScope;
  currentScope = scope;
  try {
    return callback();
  } finally {
    currentScope = outerScope;
    let ancestor: Scope | undefined = scope;
    while (ancestor && ancestor !== nearestRunningAncestor) {
      delete ancestor[runningSymbol];
      ancestor = ancestor[parentSymbol];
    }
  }
};

/**
 * Whether a callback is currently running in the provided scope or one of its
 * descendants.
 */
export const isScopeRunning = (scope: Scope): boolean => runningSymbol in scope;

export const isScopeDisposed = (scope: Scope): boolean =>
  disposedSymbol in scope;
