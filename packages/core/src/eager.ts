import { AtomOptions, ValueAtom, atomSymbol, createNodeSymbol } from "./atom";
import {
  Watch,
  commit,
  createDerivedNode,
  evaluate,
  markClean,
} from "./reactivity";

/**
 * Like `createComputed`, but the node computes as soon as it's created and
 * after every change of a source, whether or not anyone consumes it. Reads
 * return the stored value without computing.
 */
export const createEagerComputed = <Value>(
  compute: (watch: Watch) => Value,
  options: AtomOptions<Value> = {}
): ValueAtom<Value> => {
  const atom: ValueAtom<Value> = {
    [atomSymbol]: "eager",
    name: options.name,
    dispose: options.dispose ?? "keepAlive",
    isEqual: options.isEqual ?? Object.is,
    [createNodeSymbol]: (host) =>
      createDerivedNode(atom, host, true, (node) => {
        const value = evaluate(node, compute);
        markClean(node);
        commit(node, value);
      }),
  };
  return atom;
};
