export * from "./comparators";
export * from "./response-object";
export * from "./response.types";
