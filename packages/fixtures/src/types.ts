/** A value, or a function of the fixture's sequence index producing it. */
export type Thunk<T> = ((index: number) => T) | T;

export interface FixtureFactory<T extends object> {
  /** Build one fixture (index 0) with shallow overrides applied. */
  (overrides?: Partial<T>): T;
  /**
   * Build `count` fixtures. `overrides` may vary per index; defaults that
   * are functions receive the index too.
   */
  list(count: number, overrides?: Thunk<Partial<T>>): T[];
  /** Derive a factory whose defaults include `partial`. */
  extend(partial: Thunk<Partial<T>>): FixtureFactory<T>;
}
