import type { ChannelNode } from "./channel";
import type { GraphNode, Host, Log } from "./reactivity";

export const atomSymbol = Symbol("atom");
export const createNodeSymbol = Symbol("createNode");
const overrideSymbol = Symbol("override");

/**
 * - `keepAlive`: the node lives as long as its container.
 *
 * - `autoDispose`: the node is disposed as soon as it has neither listeners
 *   nor observers, and the next resolution starts from the initial value.
 *
 * - `delayed`: like `autoDispose`, but the check runs after the container's
 *   `disposeDelay`, and subscribing in the meantime cancels it.
 */
export type DisposePolicy = "keepAlive" | "autoDispose" | "delayed";

export type AtomKind = "state" | "lazy" | "eager" | "safe" | "async";

export interface AtomOptions<Value> {
  /**
   * Shows up in log output and error messages.
   */
  name?: string;
  dispose?: DisposePolicy;
  /**
   * Defaults to `Object.is`. Writes and recomputations that produce a value
   * equal to the current one do not notify anyone.
   */
  isEqual?: (a: Value, b: Value) => boolean;
}

/**
 * An immutable descriptor of a slot of reactive state. It holds no value: a
 * container materializes a node for it on first use.
 */
export interface ValueAtom<Value> {
  readonly [atomSymbol]: AtomKind;
  readonly name: string | undefined;
  readonly dispose: DisposePolicy;
  isEqual(a: Value, b: Value): boolean;
  [createNodeSymbol](host: Host): GraphNode<Value>;
}

export interface StateAtom<Value> extends ValueAtom<Value> {
  readonly [atomSymbol]: "state";
  readonly initial: Value;
}

export type DeliveryStrategy =
  | { readonly kind: "drop" }
  | { readonly kind: "buffer"; readonly size: number }
  | { readonly kind: "ttl"; readonly duration: number };

export interface ChannelAtom<Payload> {
  readonly [atomSymbol]: "channel";
  readonly name: string | undefined;
  readonly strategy: DeliveryStrategy;
  [createNodeSymbol](log: Log): ChannelNode<Payload>;
}

/**
 * A replacement initial value for an atom, local to the container created
 * with it. Overriding a computed atom pins it to a constant in that container.
 */
export interface Override<Value> {
  readonly [overrideSymbol]: true;
  readonly atom: ValueAtom<Value>;
  readonly value: Value;
}

export const isAtom = (
  value: unknown
): value is ValueAtom<unknown> | ChannelAtom<unknown> =>
  typeof value === "object" && value !== null && atomSymbol in value;

export const override = <Value>(
  atom: ValueAtom<Value>,
  value: Value
): Override<Value> => ({
  [overrideSymbol]: true,
  atom,
  value,
});

export const describeAtom = (
  atom: ValueAtom<unknown> | ChannelAtom<unknown>
): string => atom.name ?? atom[atomSymbol];
