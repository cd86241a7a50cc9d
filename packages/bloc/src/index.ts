// @trending/bloc - generic bloc runtime: event queue, listeners, logging, config

export * from "./bloc.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./logger.js";
