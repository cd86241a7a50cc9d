export { createFixtureFactory } from "./fixture-factory.js";

export type { FixtureFactory, Thunk } from "./types.js";
