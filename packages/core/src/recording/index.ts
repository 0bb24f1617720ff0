export * from "./recording.types";
export * from "./reporter";
