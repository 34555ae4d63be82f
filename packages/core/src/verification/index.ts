export * from "./verifier";
