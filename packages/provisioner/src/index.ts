export * from "./errors";
export * from "./strategy";
export * from "./config";
export * from "./bootstrap";
export { main, createProgram } from "./cli";
export * from "./exec/command-runner";
export * from "./log/provision-log";
export * from "./report/reporter";
export * from "./report/summary";
export * from "./runtime/detect";
export * from "./runtime/install";
export * from "./runtime/service";
export * from "./runtime/models";
export * from "./runtime/system-info";
export * from "./steps";
