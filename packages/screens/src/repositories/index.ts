export * from "./bloc.js";
export * from "./config.js";
export * from "./fetcher.js";
export * from "./machine.js";
export * from "./schemas.js";
export * from "./state.js";
