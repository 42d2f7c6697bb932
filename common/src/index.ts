export * from "./address";
export * from "./classify";
export * from "./components";
export * from "./exceptions";
export * from "./lookup";
export * from "./normalize";
export * from "./recovery";
export * from "./standardize";
export * from "./tagger";
export * from "./tags";
