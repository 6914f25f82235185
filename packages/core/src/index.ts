export * from "./types/provisioning";
export * from "./manifest/schema";
