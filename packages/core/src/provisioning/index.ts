export * from "./graph";
export * from "./handlers";
export * from "./preflight";
export * from "./provisioner";
export * from "./state";
