import { AtomOptions, ValueAtom, atomSymbol, createNodeSymbol } from "./atom";
import {
  Watch,
  commit,
  createDerivedNode,
  evaluate,
  markClean,
} from "./reactivity";

/**
 * A derived atom that computes on first read and, once a source has changed,
 * on the next read. It recomputes right away only while it has listeners or
 * observers. Errors thrown by `compute` propagate to the reader, and the node
 * stays dirty so the next read tries again.
 */
export const createComputed = <Value>(
  compute: (watch: Watch) => Value,
  options: AtomOptions<Value> = {}
): ValueAtom<Value> => {
  const atom: ValueAtom<Value> = {
    [atomSymbol]: "lazy",
    name: options.name,
    dispose: options.dispose ?? "keepAlive",
    isEqual: options.isEqual ?? Object.is,
    [createNodeSymbol]: (host) =>
      createDerivedNode(atom, host, false, (node) => {
        const value = evaluate(node, compute);
        markClean(node);
        commit(node, value);
      }),
  };
  return atom;
};
