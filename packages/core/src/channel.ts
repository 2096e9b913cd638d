import { label } from "@1log/core";
import {
  ChannelAtom,
  DeliveryStrategy,
  atomSymbol,
  createNodeSymbol,
  describeAtom,
} from "./atom";
import { Log, runClientCallback } from "./reactivity";

export interface ChannelOptions {
  name?: string;
  /**
   * - `drop` (default): only listeners present at the time of the emit
   *   receive the payload.
   *
   * - `buffer`: the last `bufferSize` payloads are replayed to every new
   *   listener.
   *
   * - `ttl`: payloads younger than `ttl` milliseconds are replayed to every new
   *   listener.
   */
  strategy?: DeliveryStrategy["kind"];
  bufferSize?: number;
  ttl?: number;
}

/**
 * Live dispatcher of a channel in one container.
 */
export interface ChannelNode<Payload> {
  emit(payload: Payload): void;
  listen(callback: (payload: Payload) => void): () => void;
  dispose(): void;
}

const checkAmount = (name: string, value: number) => {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(
      `Channel option "${name}" must be a finite non-negative number, got ${value}.`
    );
  }
  return value;
};

const getStrategy = (options: ChannelOptions): DeliveryStrategy => {
  switch (options.strategy) {
    case "buffer":
      return {
        kind: "buffer",
        size: checkAmount("bufferSize", options.bufferSize ?? 10),
      };
    case "ttl":
      return { kind: "ttl", duration: checkAmount("ttl", options.ttl ?? 30000) };
    default:
      return { kind: "drop" };
  }
};

/**
 * Creates the descriptor of a stream of one-off events. A channel has no
 * current value: `emit` hands the payload to the listeners registered with
 * `on`, and depending on the strategy keeps it for listeners that come later.
 */
export const createChannel = <Payload>(
  options: ChannelOptions = {}
): ChannelAtom<Payload> => {
  const strategy = getStrategy(options);
  const atom: ChannelAtom<Payload> = {
    [atomSymbol]: "channel",
    name: options.name,
    strategy,
    [createNodeSymbol]: (log: Log): ChannelNode<Payload> => {
      const listeners = new Set<(payload: Payload) => void>();
      let entries: { payload: Payload; time: number }[] = [];
      let disposed = false;
      const emitLog = log.add(label("emit"));

      const evict = () => {
        if (strategy.kind === "ttl") {
          const now = Date.now();
          for (
            let entry = entries[0];
            entry && now - entry.time > strategy.duration;
            entry = entries[0]
          ) {
            entries.shift();
          }
        }
      };

      return {
        emit(payload) {
          if (disposed) {
            return;
          }
          emitLog(describeAtom(atom));
          if (strategy.kind !== "drop") {
            evict();
            entries.push({ payload, time: Date.now() });
            if (strategy.kind === "buffer") {
              while (entries.length > strategy.size) {
                entries.shift();
              }
            }
          }
          for (const listener of [...listeners]) {
            runClientCallback(() => {
              listener(payload);
            });
          }
        },
        listen(callback) {
          evict();
          for (const { payload } of entries) {
            runClientCallback(() => {
              callback(payload);
            });
          }
          if (disposed) {
            return () => {};
          }
          const listener = (payload: Payload) => {
            callback(payload);
          };
          listeners.add(listener);
          return () => {
            listeners.delete(listener);
          };
        },
        dispose() {
          disposed = true;
          entries = [];
          listeners.clear();
        },
      };
    },
  };
  return atom;
};
