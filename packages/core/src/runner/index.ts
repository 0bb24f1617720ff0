export * from "./runner.types";
export * from "./test-runner";
