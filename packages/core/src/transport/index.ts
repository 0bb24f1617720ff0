export * from "./fetch.transport";
export * from "./transport.types";
