import { pipe } from "pipe-function";
import { createContainer } from "./container";
import { select, selectMany, where } from "./select";
import { createState } from "./state";

interface User {
  readonly name: string;
  readonly age: number;
  readonly tags: readonly string[];
}

const alice: User = { name: "Alice", age: 30, tags: ["admin"] };

test("select", () => {
  const container = createContainer();
  const user = createState(alice);
  const name = pipe(
    user,
    select((value: User) => value.name)
  );
  const listener = jest.fn();
  container.subscribe(name, listener);
  expect(container.read(name)).toBe("Alice");
  container.write(user, { ...alice, age: 31 });
  expect(listener).not.toHaveBeenCalled();
  container.write(user, { ...alice, name: "Bob" });
  expect(listener.mock.calls).toEqual([["Bob"]]);
});

test("select with a comparer", () => {
  const container = createContainer();
  const user = createState(alice);
  const tags = pipe(
    user,
    select(
      (value: User) => value.tags,
      (a, b) => a.join() === b.join()
    )
  );
  const listener = jest.fn();
  container.subscribe(tags, listener);
  container.write(user, { ...alice, tags: ["admin"] });
  expect(listener).not.toHaveBeenCalled();
  container.write(user, { ...alice, tags: ["admin", "editor"] });
  expect(listener.mock.calls).toEqual([[["admin", "editor"]]]);
});

test("selectMany", () => {
  const container = createContainer();
  const user = createState(alice);
  const summary = pipe(
    user,
    selectMany<User, string | number>([
      (value) => value.name,
      (value) => value.age,
    ])
  );
  const listener = jest.fn();
  container.subscribe(summary, listener);
  expect(container.read(summary)).toEqual(["Alice", 30]);
  container.write(user, { ...alice, tags: [] });
  expect(listener).not.toHaveBeenCalled();
  container.write(user, { ...alice, age: 31 });
  expect(listener.mock.calls).toEqual([[["Alice", 31]]]);
});

test("where", () => {
  const container = createContainer();
  const count = createState(1);
  const even = pipe(
    count,
    where((value: number) => value % 2 === 0)
  );
  expect(container.read(even)).toBe(undefined);
  container.write(count, 4);
  expect(container.read(even)).toBe(4);
});

test("operators compose", () => {
  const container = createContainer();
  const user = createState(alice);
  const adultAge = pipe(
    user,
    select((value: User) => value.age),
    where((age: number) => age >= 18)
  );
  expect(container.read(adultAge)).toBe(30);
  container.write(user, { ...alice, age: 12 });
  expect(container.read(adultAge)).toBe(undefined);
});
