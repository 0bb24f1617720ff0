export * from "./builtin-modules";
export * from "./context";
export * from "./context.types";
