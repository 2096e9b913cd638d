import { AtomOptions, ValueAtom, atomSymbol, createNodeSymbol } from "./atom";
import { CircularDependencyError } from "./errors";
import {
  Watch,
  commit,
  createDerivedNode,
  evaluate,
  markClean,
} from "./reactivity";
import { Result, failure, isSameResult, success } from "./result";

/**
 * A lazy derived atom whose value is a `Result`: what `compute` throws is
 * stored as a failure instead of reaching the reader. Circular dependencies
 * are still thrown.
 *
 * `options.isEqual` compares successful values. Two failures are equal only if
 * they hold the same error.
 */
export const createSafeComputed = <Value>(
  compute: (watch: Watch) => Value,
  options: AtomOptions<Value> = {}
): ValueAtom<Result<Value>> => {
  const isEqual = options.isEqual ?? Object.is;
  const atom: ValueAtom<Result<Value>> = {
    [atomSymbol]: "safe",
    name: options.name,
    dispose: options.dispose ?? "keepAlive",
    isEqual: (a, b) => isSameResult(a, b, isEqual),
    [createNodeSymbol]: (host) =>
      createDerivedNode(atom, host, false, (node) => {
        const result = evaluate(node, (watch): Result<Value> => {
          try {
            return success(compute(watch));
          } catch (error) {
            if (error instanceof CircularDependencyError) {
              throw error;
            }
            return failure(error);
          }
        });
        markClean(node);
        commit(node, result);
      }),
  };
  return atom;
};
