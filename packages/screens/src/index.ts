// @trending/screens - blocs for the trending-repositories and counter screens

export * from "./repositories/index.js";
export * from "./counter/bloc.js";
