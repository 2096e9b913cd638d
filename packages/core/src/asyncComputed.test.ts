import { readLog } from "@1log/jest";
import { createAsyncComputed } from "./asyncComputed";
import { createContainer } from "./container";
import { createComputed } from "./lazy";
import { AsyncValue, getAsyncData } from "./result";
import { log } from "./setupTests";
import { createState } from "./state";

const flushMicrotasks = async () => {
  await new Promise((resolve) => {
    setTimeout(resolve);
  });
};

interface Request<Value> {
  readonly id: number;
  readonly resolve: (value: Value) => void;
  readonly reject: (error: unknown) => void;
}

/**
 * An async atom that fetches a user name by id, where each request is settled
 * by the test.
 */
const createUserAtom = (name?: string) => {
  const id = createState(1);
  const requests: Request<string>[] = [];
  const user = createAsyncComputed(
    (watch) => {
      const currentId = watch(id);
      return new Promise<string>((resolve, reject) => {
        requests.push({ id: currentId, resolve, reject });
      });
    },
    { name }
  );
  return { id, requests, user };
};

test("loading, then data", async () => {
  const container = createContainer();
  const { id, requests, user } = createUserAtom();
  expect(container.read(user)).toEqual({ status: "loading" });
  expect(requests.map((request) => request.id)).toEqual([1]);
  requests[0]!.resolve("alice");
  await flushMicrotasks();
  expect(container.read(user)).toEqual({ status: "data", data: "alice" });
  container.write(id, 2);
  expect(container.read(user)).toEqual({ status: "loading", previous: "alice" });
  requests[1]!.resolve("bob");
  await flushMicrotasks();
  expect(container.read(user)).toEqual({ status: "data", data: "bob" });
});

test("results of superseded computations are dropped", async () => {
  const container = createContainer({ log });
  const { id, requests, user } = createUserAtom("user");
  container.read(user);
  container.write(id, 2);
  container.write(id, 3);
  expect(readLog()).toMatchInlineSnapshot(`
    > [recompute] "user"
    > [recompute] "user"
    > [recompute] "user"
  `);
  requests[2]!.resolve("carol");
  requests[1]!.resolve("bob");
  requests[0]!.resolve("alice");
  await flushMicrotasks();
  expect(readLog()).toMatchInlineSnapshot(`
    > [stale] "user"
    > [stale] "user"
  `);
  expect(container.read(user)).toEqual({ status: "data", data: "carol" });
});

test("listeners are notified of every state", async () => {
  const container = createContainer();
  const { id, requests, user } = createUserAtom();
  const states: AsyncValue<string>[] = [];
  container.subscribe(user, (value) => {
    states.push(value);
  });
  requests[0]!.resolve("alice");
  await flushMicrotasks();
  container.write(id, 2);
  requests[1]!.reject("not found");
  await flushMicrotasks();
  expect(states.map(({ status }) => status)).toEqual([
    "data",
    "loading",
    "error",
  ]);
  expect(states[1]).toEqual({ status: "loading", previous: "alice" });
  const last = states[2];
  expect(last?.status === "error" && last.error).toBe("not found");
});

test("synchronous errors", () => {
  const container = createContainer();
  const error = new Error("sync");
  const failing = createAsyncComputed<number>(() => {
    throw error;
  });
  const value = container.read(failing);
  expect(value.status === "error" && value.error).toBe(error);
});

test("rejections", async () => {
  const container = createContainer();
  const error = new Error("async");
  const failing = createAsyncComputed(async () => {
    throw error;
  });
  expect(container.read(failing)).toEqual({ status: "loading" });
  await flushMicrotasks();
  const value = container.read(failing);
  expect(value.status === "error" && value.error).toBe(error);
});

test("watch is only tracked until the first await", async () => {
  const container = createContainer({ log });
  const a = createState(1);
  const b = createState(10);
  const sum = createAsyncComputed(
    async (watch) => {
      const first = watch(a);
      await Promise.resolve();
      return first + watch(b);
    },
    { name: "sum" }
  );
  container.read(sum);
  expect(readLog()).toMatchInlineSnapshot(`> [recompute] "sum"`);
  await flushMicrotasks();
  expect(readLog()).toMatchInlineSnapshot(`> [untracked] "sum"`);
  expect(container.read(sum)).toEqual({ status: "data", data: 11 });
  container.write(b, 20);
  expect(container.read(sum)).toEqual({ status: "data", data: 11 });
  container.write(a, 2);
  expect(readLog()).toMatchInlineSnapshot(`> [recompute] "sum"`);
  await flushMicrotasks();
  expect(readLog()).toMatchInlineSnapshot(`> [untracked] "sum"`);
  expect(container.read(sum)).toEqual({ status: "data", data: 22 });
});

test("lazy nodes can derive from async ones", async () => {
  const container = createContainer();
  const { requests, user } = createUserAtom();
  const greeting = createComputed(
    (watch) => `Hello, ${getAsyncData(watch(user)) ?? "stranger"}!`
  );
  expect(container.read(greeting)).toBe("Hello, stranger!");
  requests[0]!.resolve("alice");
  await flushMicrotasks();
  expect(container.read(greeting)).toBe("Hello, alice!");
});

test("results arriving after disposal are dropped", async () => {
  const container = createContainer({ log });
  const { requests, user } = createUserAtom("user");
  container.read(user);
  expect(readLog()).toMatchInlineSnapshot(`> [recompute] "user"`);
  container.dispose();
  requests[0]!.resolve("alice");
  await flushMicrotasks();
  expect(readLog()).toMatchInlineSnapshot(`> [stale] "user"`);
});
