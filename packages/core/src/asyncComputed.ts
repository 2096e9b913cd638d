import {
  AtomOptions,
  ValueAtom,
  atomSymbol,
  createNodeSymbol,
  describeAtom,
} from "./atom";
import { CircularDependencyError } from "./errors";
import {
  Watch,
  commit,
  createDerivedNode,
  disposedSymbol,
  evaluate,
  markClean,
  transact,
} from "./reactivity";
import {
  AsyncValue,
  asyncData,
  asyncError,
  asyncLoading,
  isSameAsyncValue,
} from "./result";

type Start<Value> =
  | { readonly promise: PromiseLike<Value> }
  | { readonly error: unknown };

/**
 * A derived atom whose compute function returns a promise. The node starts
 * computing when it's first used and restarts whenever a source changes,
 * switching to "loading" with the data of the last successful run.
 *
 * Every restart starts a new generation, and a promise that settles after a
 * newer generation has started is ignored. Errors, thrown or rejected, become
 * the "error" state.
 *
 * Only `watch` calls made before the compute function first awaits are
 * tracked.
 */
export const createAsyncComputed = <Value>(
  compute: (watch: Watch) => PromiseLike<Value>,
  options: AtomOptions<Value> = {}
): ValueAtom<AsyncValue<Value>> => {
  const isEqual = options.isEqual ?? Object.is;
  const atom: ValueAtom<AsyncValue<Value>> = {
    [atomSymbol]: "async",
    name: options.name,
    dispose: options.dispose ?? "keepAlive",
    isEqual: (a, b) => isSameAsyncValue(a, b, isEqual),
    [createNodeSymbol]: (host) => {
      let generation = 0;
      let last: [] | [Value] = [];

      return createDerivedNode(atom, host, true, (node) => {
        const start = evaluate(node, (watch): Start<Value> => {
          try {
            return { promise: compute(watch) };
          } catch (error) {
            if (error instanceof CircularDependencyError) {
              throw error;
            }
            return { error };
          }
        });
        const current = ++generation;
        markClean(node);
        if ("error" in start) {
          commit(node, asyncError(start.error));
          return;
        }
        commit(node, asyncLoading(...last));

        const settle = (value: AsyncValue<Value>) => {
          if (current !== generation || disposedSymbol in node) {
            host.runtime.staleLog(describeAtom(atom));
            return;
          }
          if (value.status === "data") {
            last = [value.data];
          }
          try {
            transact(host.runtime, () => {
              commit(node, value);
            });
          } catch (error) {
            queueMicrotask(() => {
              throw error;
            });
          }
        };
        start.promise.then(
          (data) => {
            settle(asyncData(data));
          },
          (error) => {
            settle(asyncError(error));
          }
        );
      });
    },
  };
  return atom;
};
