import { AtomOptions, StateAtom, atomSymbol, createNodeSymbol } from "./atom";
import { createNode } from "./reactivity";

/**
 * Creates the descriptor of a mutable cell. Containers store a value for it
 * that starts as `initial` (or an override) and changes only through `write`.
 *
 * Writes are compared to the current value with `isEqual`, so mutating a
 * stored object in place and writing it back is not seen as a change.
 */
export const createState = <Value>(
  initial: Value,
  options: AtomOptions<Value> = {}
): StateAtom<Value> => {
  const atom: StateAtom<Value> = {
    [atomSymbol]: "state",
    name: options.name,
    dispose: options.dispose ?? "keepAlive",
    initial,
    isEqual: options.isEqual ?? Object.is,
    [createNodeSymbol]: (host) => createNode(atom, host, initial),
  };
  return atom;
};
