import { ValueAtom } from "./atom";
import { createComputed } from "./lazy";

/**
 * Derives a lazy computed atom holding a part of another atom's value. Like
 * the other operators in this module it's curried, for use with `pipe`:
 *
 * ```ts
 * const name = pipe(user, select((user) => user.name));
 * ```
 *
 * With `isEqual`, a new selected value that is equal to the current one is not
 * a change.
 */
export const select =
  <Value, Selected>(
    selector: (value: Value) => Selected,
    isEqual?: (a: Selected, b: Selected) => boolean
  ) =>
  (atom: ValueAtom<Value>): ValueAtom<Selected> =>
    createComputed((watch) => selector(watch(atom)), { isEqual });

const isShallowEqual = (a: readonly unknown[], b: readonly unknown[]) =>
  a.length === b.length && a.every((item, index) => Object.is(item, b[index]));

/**
 * The atom changes when any of the selected values changes.
 */
export const selectMany =
  <Value, Selected>(selectors: readonly ((value: Value) => Selected)[]) =>
  (atom: ValueAtom<Value>): ValueAtom<Selected[]> =>
    createComputed(
      (watch) => {
        const value = watch(atom);
        return selectors.map((selector) => selector(value));
      },
      { isEqual: isShallowEqual }
    );

/**
 * The value of the atom if it satisfies `predicate`, otherwise `undefined`.
 */
export const where =
  <Value>(predicate: (value: Value) => boolean) =>
  (atom: ValueAtom<Value>): ValueAtom<Value | undefined> =>
    createComputed((watch) => {
      const value = watch(atom);
      return predicate(value) ? value : undefined;
    });
