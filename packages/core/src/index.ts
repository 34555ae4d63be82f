export * from "./constants";
export * from "./config";
export * from "./errors";
export * from "./manifest";
export * from "./provisioning";
export * from "./verification";

export const KEYTURN_VERSION = "0.1.0";
