import type { FixtureFactory, Thunk } from "./types.js";

function resolve<T>(value: Thunk<T>, index: number): T {
  return typeof value === "function"
    ? (value as (index: number) => T)(index)
    : value;
}

/**
 * Create a typed fixture factory.
 *
 *   const item = createFixtureFactory<Item>((i) => ({ name: `repo-${i}`, ... }));
 *   item({ category: "Dart" });
 *   item.list(3);
 */
export function createFixtureFactory<T extends object>(
  defaults: Thunk<T>,
): FixtureFactory<T> {
  function build(index: number, overrides?: Partial<T>): T {
    return structuredClone({ ...resolve(defaults, index), ...overrides });
  }

  const factory = (overrides?: Partial<T>): T => build(0, overrides);

  factory.list = (count: number, overrides?: Thunk<Partial<T>>): T[] =>
    Array.from({ length: count }, (_unused, index) =>
      build(index, overrides === undefined ? undefined : resolve(overrides, index)),
    );

  factory.extend = (partial: Thunk<Partial<T>>): FixtureFactory<T> =>
    createFixtureFactory<T>((index) => ({
      ...resolve(defaults, index),
      ...resolve(partial, index),
    }));

  return factory;
}
