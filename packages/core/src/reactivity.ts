/**
 * The dependency graph shared by every kind of node.
 *
 * A node is a plain object holding a value and the set of derived nodes that
 * watched it during their last evaluation ("observers"). A derived node also
 * holds the set of nodes it watched ("sources") and a color in the sense of the
 * [three-colors
 * algorithm](https://dev.to/modderme123/super-charging-fine-grained-reactive-performance-47ph):
 *
 * - "clean" = the value is up to date,
 *
 * - "check" = some transitive source has changed, so the value may be stale,
 *
 * - "dirty" = a direct source has changed, or the node has never run.
 *
 * When a node's value changes, direct observers become dirty and their
 * transitive observers become at least "check". Observers that are "active"
 * (eager and async nodes, and lazy nodes with listeners or observers) are
 * queued and brought up to date when the outermost transaction ends, each at
 * most once. Everyone else stays stale until read.
 */
import { label, noopLog } from "@1log/core";
import { DisposePolicy, ValueAtom, atomSymbol, describeAtom } from "./atom";
import { CircularDependencyError, UninitializedAccessError } from "./errors";

export type Log = typeof noopLog;

/**
 * Passed to compute functions. Reading an atom through `watch` makes the
 * computed atom depend on it.
 */
export type Watch = <Value>(atom: ValueAtom<Value>) => Value;

export const voidSymbol = Symbol("void");
export const valueSymbol = Symbol("value");
export const hostSymbol = Symbol("host");
export const observersSymbol = Symbol("observers");
export const listenersSymbol = Symbol("listeners");
export const policySymbol = Symbol("policy");
export const disposedSymbol = Symbol("disposed");
const colorSymbol = Symbol("color");
const sourcesSymbol = Symbol("sources");
const pushSymbol = Symbol("push");
const recomputeSymbol = Symbol("recompute");

/**
 * State of a tree of containers. Every container in a tree shares the root's
 * runtime.
 */
export interface Runtime {
  readonly log: Log;
  readonly recomputeLog: Log;
  readonly untrackedLog: Log;
  readonly staleLog: Log;
  /**
   * Written to only when diagnostics are on: old and new value of every
   * changed node.
   */
  readonly changeLog: Log;
  /**
   * Written to only when diagnostics are on: every node that becomes dirty.
   */
  readonly dirtyLog: Log;
  /**
   * Derived nodes whose evaluation is in progress.
   */
  readonly evaluating: Set<DerivedNode>;
  /**
   * Active nodes to bring up to date once `depth` goes down to 0.
   */
  readonly queue: Set<DerivedNode>;
  /**
   * Nodes whose value has changed since the last flush, mapped to the value
   * they had before that. A node's first value is not a change.
   */
  readonly changed: Map<GraphNode, unknown>;
  readonly errors: unknown[];
  depth: number;
  flushing: boolean;
}

/**
 * What a node needs from the container that owns it.
 */
export interface Host {
  readonly runtime: Runtime;
  resolve<Value>(atom: ValueAtom<Value>): GraphNode<Value>;
  /**
   * Called when a node may have lost its last listener or observer.
   */
  release(node: GraphNode): void;
  /**
   * Cancels a pending delayed disposal of the node.
   */
  retain(node: GraphNode): void;
}

export interface GraphNode<Value = unknown> {
  readonly [atomSymbol]: ValueAtom<Value>;
  readonly [hostSymbol]: Host;
  [valueSymbol]: Value | typeof voidSymbol;
  readonly [observersSymbol]: Set<DerivedNode>;
  readonly [listenersSymbol]: Set<() => void>;
  [policySymbol]: DisposePolicy;
  [disposedSymbol]?: true;
}

export interface DerivedNode<Value = unknown> extends GraphNode<Value> {
  [colorSymbol]: "clean" | "check" | "dirty";
  [sourcesSymbol]: Set<GraphNode>;
  /**
   * Whether the node is brought up to date whenever a source changes, even
   * when nobody is consuming it.
   */
  readonly [pushSymbol]: boolean;
  readonly [recomputeSymbol]: () => void;
}

export const createRuntime = (log: Log, diagnostics = false): Runtime => ({
  log,
  recomputeLog: log.add(label("recompute")),
  untrackedLog: log.add(label("untracked")),
  staleLog: log.add(label("stale")),
  changeLog: diagnostics ? log.add(label("change")) : noopLog,
  dirtyLog: diagnostics ? log.add(label("dirty")) : noopLog,
  evaluating: new Set(),
  queue: new Set(),
  changed: new Map(),
  errors: [],
  depth: 0,
  flushing: false,
});

export const createNode = <Value>(
  atom: ValueAtom<Value>,
  host: Host,
  value: Value
): GraphNode<Value> => ({
  [atomSymbol]: atom,
  [hostSymbol]: host,
  [valueSymbol]: value,
  [observersSymbol]: new Set(),
  [listenersSymbol]: new Set(),
  [policySymbol]: atom.dispose,
});

/**
 * `recompute` must call `evaluate` and then `commit`. A `push` node is
 * evaluated as soon as it is created.
 */
export const createDerivedNode = <Value>(
  atom: ValueAtom<Value>,
  host: Host,
  push: boolean,
  recompute: (node: DerivedNode<Value>) => void
): DerivedNode<Value> => {
  const node: DerivedNode<Value> = {
    [atomSymbol]: atom,
    [hostSymbol]: host,
    [valueSymbol]: voidSymbol,
    [observersSymbol]: new Set(),
    [listenersSymbol]: new Set(),
    [policySymbol]: atom.dispose,
    [colorSymbol]: "dirty",
    [sourcesSymbol]: new Set(),
    [pushSymbol]: push,
    [recomputeSymbol]: () => {
      recompute(node);
    },
  };
  return node;
};

export const isDerived = (node: GraphNode): node is DerivedNode =>
  colorSymbol in node;

export const isPush = (node: DerivedNode): boolean => node[pushSymbol];

const isDirty = (node: DerivedNode) => node[colorSymbol] === "dirty";

const isActive = (node: DerivedNode) =>
  node[pushSymbol] ||
  node[listenersSymbol].size > 0 ||
  node[observersSymbol].size > 0;

/**
 * Reports errors thrown by client callbacks without interrupting the
 * notification that called them.
 */
export const runClientCallback = (callback: () => void): void => {
  try {
    callback();
  } catch (error) {
    queueMicrotask(() => {
      throw error;
    });
  }
};

/**
 * Makes sure `node` is at least "check" (or "dirty" if `dirty` is `true`), and
 * that all its transitive observers are at least "check". Queues any active
 * node that is no longer clean.
 *
 * A node can be dirty while its observers are clean: this happens when a
 * computation threw and whoever watched the node caught the error.
 */
export const mark = (node: DerivedNode, dirty: boolean): void => {
  if (dirty) {
    if (!isDirty(node)) {
      node[hostSymbol].runtime.dirtyLog(describeAtom(node[atomSymbol]));
    }
    node[colorSymbol] = "dirty";
  } else if (node[colorSymbol] === "clean") {
    node[colorSymbol] = "check";
  }
  if (isActive(node)) {
    node[hostSymbol].runtime.queue.add(node);
  }
  for (const observer of node[observersSymbol]) {
    if (observer[colorSymbol] === "clean") {
      mark(observer, false);
    }
  }
};

/**
 * Stores a new value unless it's equal to the current one. Returns whether the
 * value has changed.
 */
export const commit = <Value>(node: GraphNode<Value>, value: Value): boolean => {
  const current = node[valueSymbol];
  if (current !== voidSymbol && node[atomSymbol].isEqual(current, value)) {
    return false;
  }
  const { changed, changeLog } = node[hostSymbol].runtime;
  if (current !== voidSymbol) {
    changeLog(describeAtom(node[atomSymbol]), current, value);
    if (!changed.has(node)) {
      changed.set(node, current);
    }
  }
  node[valueSymbol] = value;
  for (const observer of node[observersSymbol]) {
    mark(observer, true);
  }
  return true;
};

/**
 * Ensures the node is clean.
 */
export const refresh = (node: DerivedNode): void => {
  if (disposedSymbol in node) {
    return;
  }
  if (node[colorSymbol] === "check") {
    // Bring sources up to date one by one until one of them changes, which
    // makes `node` dirty.
    for (const source of node[sourcesSymbol]) {
      if (isDerived(source)) {
        refresh(source);
      }
      if (isDirty(node)) {
        break;
      }
    }
    if (node[colorSymbol] === "check") {
      node[colorSymbol] = "clean";
    }
  }
  if (isDirty(node)) {
    node[recomputeSymbol]();
  }
};

export const markClean = (node: DerivedNode): void => {
  node[colorSymbol] = "clean";
};

/**
 * Replaces the edges from the last evaluation with `sources`, touching only
 * the edges that differ.
 */
const link = (node: DerivedNode, sources: Set<GraphNode>) => {
  const previousSources = node[sourcesSymbol];
  node[sourcesSymbol] = sources;
  for (const source of sources) {
    if (!previousSources.has(source)) {
      source[observersSymbol].add(node);
    }
  }
  for (const source of previousSources) {
    if (!sources.has(source)) {
      source[observersSymbol].delete(node);
      source[hostSymbol].release(source);
    }
  }
};

/**
 * Runs a compute function, collecting the nodes it watches. If the function
 * throws, the node keeps its color, so a lazy node computes again on next read.
 * The edges it collected are still saved, so that a change of what it watched
 * makes it retry, unless the error is a circular dependency: then the node is
 * left as it was.
 *
 * `watch` only tracks calls made before the function returns. For async
 * compute functions this means calls made before the first `await`. Later
 * calls return the current value without creating an edge.
 */
export const evaluate = <Value, Output>(
  node: DerivedNode<Value>,
  compute: (watch: Watch) => Output
): Output => {
  const host = node[hostSymbol];
  const { runtime } = host;
  const name = describeAtom(node[atomSymbol]);
  if (runtime.evaluating.has(node)) {
    throw new CircularDependencyError(name);
  }
  runtime.recomputeLog(name);
  const sources = new Set<GraphNode>();
  let open = true;
  const watch: Watch = (atom) => {
    const source = host.resolve(atom);
    // A push node still computing its first value has no value to read.
    if (isDerived(source) && runtime.evaluating.has(source)) {
      throw new CircularDependencyError(describeAtom(atom));
    }
    if (open) {
      sources.add(source);
    } else {
      runtime.untrackedLog(name);
    }
    return readNode(source);
  };
  runtime.evaluating.add(node);
  try {
    const output = compute(watch);
    link(node, sources);
    return output;
  } catch (error) {
    if (!(error instanceof CircularDependencyError)) {
      link(node, sources);
    }
    throw error;
  } finally {
    open = false;
    runtime.evaluating.delete(node);
  }
};

/**
 * Returns the node's value, first recomputing it if it's a lazy node that
 * isn't clean. A push node is only recomputed by a read while it's queued, so
 * that a read during a batch or a flush sees the new value and the node still
 * recomputes once.
 */
export const readNode = <Value>(node: GraphNode<Value>): Value => {
  if (
    isDerived(node) &&
    (!node[pushSymbol] || node[hostSymbol].runtime.queue.delete(node))
  ) {
    refresh(node);
  }
  const value = node[valueSymbol];
  if (value === voidSymbol) {
    throw new UninitializedAccessError(describeAtom(node[atomSymbol]));
  }
  return value;
};

/**
 * Marks the node as disposed and removes all its edges. Sources that are left
 * without observers are released.
 */
export const detach = (node: GraphNode): void => {
  node[disposedSymbol] = true;
  node[listenersSymbol].clear();
  node[observersSymbol].clear();
  if (isDerived(node)) {
    const sources = node[sourcesSymbol];
    node[sourcesSymbol] = new Set();
    for (const source of sources) {
      source[observersSymbol].delete(node);
      source[hostSymbol].release(source);
    }
  }
};

const flush = (runtime: Runtime) => {
  runtime.flushing = true;
  try {
    while (runtime.queue.size || runtime.changed.size) {
      for (const node of runtime.queue) {
        runtime.queue.delete(node);
        try {
          refresh(node);
        } catch (error) {
          runtime.errors.push(error);
        }
      }
      const changed = [...runtime.changed];
      runtime.changed.clear();
      for (const [node, previousValue] of changed) {
        if (
          disposedSymbol in node ||
          node[atomSymbol].isEqual(previousValue, node[valueSymbol])
        ) {
          continue;
        }
        for (const listener of [...node[listenersSymbol]]) {
          runClientCallback(listener);
        }
      }
    }
  } finally {
    runtime.flushing = false;
  }
  if (runtime.errors.length) {
    const errors = runtime.errors.splice(0);
    throw errors.length === 1
      ? errors[0]
      : new AggregateError(errors, "Several computed atoms threw.");
  }
};

const leave = (runtime: Runtime) => {
  runtime.depth--;
  if (!runtime.depth && !runtime.flushing) {
    flush(runtime);
  }
};

/**
 * Runs the callback, and once the outermost transaction ends, brings active
 * nodes up to date and notifies listeners of every node that has changed,
 * each once. Errors thrown while doing so are rethrown at the end. If the
 * callback itself threw, its error is rethrown instead and those of the flush
 * are reported the way errors of listeners are.
 */
export const transact = <Result>(
  runtime: Runtime,
  callback: () => Result
): Result => {
  runtime.depth++;
  let result: Result;
  try {
    result = callback();
  } catch (error) {
    runClientCallback(() => {
      leave(runtime);
    });
    throw error;
  }
  leave(runtime);
  return result;
};
