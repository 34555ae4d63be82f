export * from "./types";
export * from "./intrinsics";
export * from "./parse";
export * from "./policies";
export * from "./rotation-manifest";
