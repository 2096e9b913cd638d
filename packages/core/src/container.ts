import { noopLog } from "@1log/core";
import {
  ChannelAtom,
  Override,
  StateAtom,
  ValueAtom,
  atomSymbol,
  createNodeSymbol,
} from "./atom";
import { ChannelNode } from "./channel";
import { CircularDependencyError, ContainerDisposedError } from "./errors";
import {
  GraphNode,
  Host,
  Log,
  Runtime,
  commit,
  createNode,
  createRuntime,
  detach,
  disposedSymbol,
  hostSymbol,
  isDerived,
  isPush,
  listenersSymbol,
  mark,
  observersSymbol,
  policySymbol,
  readNode,
  refresh,
  transact,
  valueSymbol,
  voidSymbol,
} from "./reactivity";

const containerSymbol = Symbol("container");
const parentSymbol = Symbol("parent");
const childrenSymbol = Symbol("children");
const runtimeSymbol = Symbol("runtime");
const nodesSymbol = Symbol("nodes");
const overridesSymbol = Symbol("overrides");
const channelsSymbol = Symbol("channels");
const timersSymbol = Symbol("timers");
const disposeDelaySymbol = Symbol("disposeDelay");

export interface ContainerOptions {
  parent?: Container;
  overrides?: readonly Override<unknown>[];
  /**
   * Only taken into account for a root container: children log to their
   * root's log.
   */
  log?: Log;
  /**
   * Only taken into account for a root container. Also logs every change of a
   * node's value (`[change]`, with the old and the new value) and every node
   * that becomes dirty (`[dirty]`).
   */
  diagnostics?: boolean;
  /**
   * Milliseconds between a "delayed" node losing its last consumer and its
   * disposal. Defaults to the parent's, or 5000 for a root container.
   */
  disposeDelay?: number;
}

/**
 * Holds the nodes of a set of atoms. An atom resolves to the nearest container
 * up the parent chain that already has a node for it or overrides it.
 * Otherwise its node is created in the root container, so an atom that is not
 * overridden anywhere is shared by the whole tree.
 */
export interface Container {
  readonly [containerSymbol]: true;
  readonly [parentSymbol]: Container | undefined;
  readonly [childrenSymbol]: Set<Container>;
  readonly [runtimeSymbol]: Runtime;
  readonly [hostSymbol]: Host;
  readonly [nodesSymbol]: Map<ValueAtom<unknown>, GraphNode>;
  readonly [overridesSymbol]: Map<ValueAtom<unknown>, unknown>;
  readonly [channelsSymbol]: Map<ChannelAtom<unknown>, ChannelNode<unknown>>;
  readonly [timersSymbol]: Map<GraphNode, ReturnType<typeof setTimeout>>;
  readonly [disposeDelaySymbol]: number;
  [disposedSymbol]?: true;

  read<Value>(atom: ValueAtom<Value>): Value;
  /**
   * Does nothing if `value` is equal to the current value. An object mutated
   * in place and written back is equal to itself.
   */
  write<Value>(atom: StateAtom<Value>, value: Value): void;
  update<Value>(atom: StateAtom<Value>, transform: (value: Value) => Value): void;
  /**
   * Listeners and active computed atoms are notified once, when the outermost
   * batch ends.
   */
  batch<Result>(callback: () => Result): Result;
  emit<Payload>(channel: ChannelAtom<Payload>, payload: Payload): void;
  on<Payload>(
    channel: ChannelAtom<Payload>,
    callback: (payload: Payload) => void
  ): () => void;
  subscribe<Value>(
    atom: ValueAtom<Value>,
    listener: (value: Value) => void
  ): () => void;
  /**
   * Makes a computed atom recompute. Does nothing if there is no node for it
   * yet.
   */
  invalidate(atom: ValueAtom<unknown>): void;
  invalidateAllComputed(): void;
  keepAlive(atom: ValueAtom<unknown>): void;
  /**
   * Disposes the nodes and channels of this container and its descendants.
   */
  dispose(): void;
}

export const isContainer = (value: unknown): value is Container =>
  typeof value === "object" && value !== null && containerSymbol in value;

const assertNotDisposed = (container: Container) => {
  if (disposedSymbol in container) {
    throw new ContainerDisposedError();
  }
};

/**
 * Adds a node to the container, then computes it right away if it's a push
 * node. A push node whose first computation threw stays in the container
 * uninitialized, unless it threw because of a circular dependency.
 */
const materialize = (container: Container, node: GraphNode): GraphNode => {
  container[nodesSymbol].set(node[atomSymbol], node);
  if (isDerived(node) && isPush(node)) {
    try {
      refresh(node);
    } catch (error) {
      if (error instanceof CircularDependencyError) {
        container[nodesSymbol].delete(node[atomSymbol]);
        detach(node);
      }
      throw error;
    }
  }
  return node;
};

const lookup = (container: Container, atom: ValueAtom<unknown>): GraphNode => {
  let root = container;
  for (
    let current: Container | undefined = container;
    current;
    current = current[parentSymbol]
  ) {
    assertNotDisposed(current);
    const node = current[nodesSymbol].get(atom);
    if (node) {
      return node;
    }
    const overrides = current[overridesSymbol];
    if (overrides.has(atom)) {
      return materialize(
        current,
        createNode(atom, current[hostSymbol], overrides.get(atom))
      );
    }
    root = current;
  }
  return materialize(root, atom[createNodeSymbol](root[hostSymbol]));
};

/**
 * Like `lookup`, but never creates a node.
 */
const find = (
  container: Container,
  atom: ValueAtom<unknown>
): GraphNode | undefined => {
  for (
    let current: Container | undefined = container;
    current;
    current = current[parentSymbol]
  ) {
    assertNotDisposed(current);
    const node = current[nodesSymbol].get(atom);
    if (node) {
      return node;
    }
  }
  return undefined;
};

const lookupChannel = <Payload>(
  container: Container,
  channel: ChannelAtom<Payload>
): ChannelNode<Payload> => {
  let root = container;
  for (
    let current: Container | undefined = container;
    current;
    current = current[parentSymbol]
  ) {
    assertNotDisposed(current);
    // Channels are stored by the atom they were created from.
    const node = current[channelsSymbol].get(channel) as
      | ChannelNode<Payload>
      | undefined;
    if (node) {
      return node;
    }
    root = current;
  }
  const node = channel[createNodeSymbol](root[runtimeSymbol].log);
  root[channelsSymbol].set(channel, node);
  return node;
};

const isUnused = (node: GraphNode) =>
  node[policySymbol] !== "keepAlive" &&
  !node[listenersSymbol].size &&
  !node[observersSymbol].size;

const disposeNode = (container: Container, node: GraphNode) => {
  const nodes = container[nodesSymbol];
  if (nodes.get(node[atomSymbol]) === node) {
    nodes.delete(node[atomSymbol]);
  }
  detach(node);
};

const cancelTimer = (container: Container, node: GraphNode) => {
  const timers = container[timersSymbol];
  const timer = timers.get(node);
  if (timer !== undefined) {
    clearTimeout(timer);
    timers.delete(node);
  }
};

const disposeContainer = (container: Container) => {
  for (const child of container[childrenSymbol]) {
    disposeContainer(child);
  }
  container[disposedSymbol] = true;
  container[parentSymbol]?.[childrenSymbol].delete(container);
  for (const timer of container[timersSymbol].values()) {
    clearTimeout(timer);
  }
  container[timersSymbol].clear();
  const nodes = [...container[nodesSymbol].values()];
  container[nodesSymbol].clear();
  for (const node of nodes) {
    detach(node);
  }
  for (const channel of container[channelsSymbol].values()) {
    channel.dispose();
  }
  container[channelsSymbol].clear();
};

export const createContainer = (options: ContainerOptions = {}): Container => {
  const { parent } = options;
  if (parent) {
    assertNotDisposed(parent);
  }
  const runtime = parent
    ? parent[runtimeSymbol]
    : createRuntime(options.log ?? noopLog, options.diagnostics);

  const host: Host = {
    runtime,
    resolve: <Value>(atom: ValueAtom<Value>) =>
      // The node was created for `atom`.
      lookup(container, atom) as GraphNode<Value>,
    release: (node) => {
      if (disposedSymbol in container || !isUnused(node)) {
        return;
      }
      if (node[policySymbol] === "autoDispose") {
        disposeNode(container, node);
      } else if (!container[timersSymbol].has(node)) {
        container[timersSymbol].set(
          node,
          setTimeout(() => {
            container[timersSymbol].delete(node);
            if (isUnused(node)) {
              disposeNode(container, node);
            }
          }, container[disposeDelaySymbol])
        );
      }
    },
    retain: (node) => {
      cancelTimer(container, node);
    },
  };

  const container: Container = {
    [containerSymbol]: true,
    [parentSymbol]: parent,
    [childrenSymbol]: new Set(),
    [runtimeSymbol]: runtime,
    [hostSymbol]: host,
    [nodesSymbol]: new Map(),
    [overridesSymbol]: new Map(
      (options.overrides ?? []).map(
        ({ atom, value }): [ValueAtom<unknown>, unknown] => [atom, value]
      )
    ),
    [channelsSymbol]: new Map(),
    [timersSymbol]: new Map(),
    [disposeDelaySymbol]:
      options.disposeDelay ?? parent?.[disposeDelaySymbol] ?? 5000,

    read: (atom) =>
      transact(runtime, () => {
        assertNotDisposed(container);
        return readNode(host.resolve(atom));
      }),

    write: (atom, value) => {
      transact(runtime, () => {
        assertNotDisposed(container);
        commit(host.resolve(atom), value);
      });
    },

    update: (atom, transform) => {
      container.batch(() => {
        container.write(atom, transform(container.read(atom)));
      });
    },

    batch: (callback) =>
      transact(runtime, () => {
        assertNotDisposed(container);
        return callback();
      }),

    emit: (channel, payload) => {
      lookupChannel(container, channel).emit(payload);
    },

    on: (channel, callback) => lookupChannel(container, channel).listen(callback),

    subscribe: <Value>(
      atom: ValueAtom<Value>,
      listener: (value: Value) => void
    ) =>
      transact(runtime, () => {
        assertNotDisposed(container);
        const node = host.resolve(atom);
        node[hostSymbol].retain(node);
        if (isDerived(node) && !isPush(node)) {
          refresh(node);
        }
        const notify = () => {
          const value = node[valueSymbol];
          if (value !== voidSymbol) {
            listener(value);
          }
        };
        node[listenersSymbol].add(notify);
        return () => {
          if (node[listenersSymbol].delete(notify)) {
            node[hostSymbol].release(node);
          }
        };
      }),

    invalidate: (atom) => {
      transact(runtime, () => {
        const node = find(container, atom);
        if (node && isDerived(node)) {
          mark(node, true);
        }
      });
    },

    invalidateAllComputed: () => {
      transact(runtime, () => {
        assertNotDisposed(container);
        for (const node of container[nodesSymbol].values()) {
          if (isDerived(node)) {
            mark(node, true);
          }
        }
      });
    },

    keepAlive: (atom) => {
      transact(runtime, () => {
        assertNotDisposed(container);
        const node = host.resolve(atom);
        node[policySymbol] = "keepAlive";
        node[hostSymbol].retain(node);
      });
    },

    dispose: () => {
      assertNotDisposed(container);
      disposeContainer(container);
    },
  };
  parent?.[childrenSymbol].add(container);
  return container;
};
