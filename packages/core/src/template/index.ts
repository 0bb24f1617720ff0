export * from "./template-resolver";
