import { createContainer } from "./container";
import { createEagerComputed } from "./eager";
import { createComputed } from "./lazy";
import { createState } from "./state";

const mockMicrotaskQueue: (() => void)[] = [];
const originalQueueMicrotask = queueMicrotask;

beforeEach(() => {
  global.queueMicrotask = (task) => mockMicrotaskQueue.push(task);
});

afterEach(() => {
  mockMicrotaskQueue.length = 0;
  global.queueMicrotask = originalQueueMicrotask;
});

test("a throwing listener does not stop the others", () => {
  const container = createContainer();
  const a = createState(0);
  container.subscribe(a, () => {
    throw new Error("listener failed");
  });
  const listener = jest.fn();
  container.subscribe(a, listener);
  container.write(a, 1);
  expect(listener.mock.calls).toEqual([[1]]);
  expect(mockMicrotaskQueue.length).toBe(1);
  expect(mockMicrotaskQueue[0]).toThrow("listener failed");
});

test("writes made by listeners are flushed in the same pass", () => {
  const container = createContainer();
  const a = createState(0);
  const b = createState(0);
  container.subscribe(a, (value) => {
    container.write(b, value * 10);
  });
  const listener = jest.fn();
  container.subscribe(b, listener);
  container.write(a, 1);
  expect(listener.mock.calls).toEqual([[10]]);
});

test("a dropped dependency is released", () => {
  const container = createContainer();
  const useX = createState(true);
  const x = createState(1, { dispose: "autoDispose" });
  const y = createState(2);
  const picked = createComputed((watch) => (watch(useX) ? watch(x) : watch(y)));
  container.subscribe(picked, () => {});
  container.write(x, 5);
  expect(container.read(picked)).toBe(5);
  container.write(useX, false);
  expect(container.read(picked)).toBe(2);
  expect(container.read(x)).toBe(1);
});

test("unsubscribing twice is harmless", () => {
  const container = createContainer();
  const a = createState(0, { dispose: "autoDispose" });
  const unsubscribe = container.subscribe(a, () => {});
  const other = container.subscribe(a, () => {});
  container.write(a, 1);
  unsubscribe();
  unsubscribe();
  expect(container.read(a)).toBe(1);
  other();
  expect(container.read(a)).toBe(0);
});

test("an error thrown in a batch is not replaced by errors of the flush", () => {
  const container = createContainer();
  const a = createState(1);
  const checked = createEagerComputed((watch) => {
    if (watch(a) > 1) {
      throw new Error("recompute failed");
    }
    return 1;
  });
  container.read(checked);
  expect(() => {
    container.batch(() => {
      container.write(a, 2);
      throw new Error("batch failed");
    });
  }).toThrow("batch failed");
  expect(container.read(a)).toBe(2);
  expect(mockMicrotaskQueue.length).toBe(1);
  expect(mockMicrotaskQueue[0]).toThrow("recompute failed");
});
