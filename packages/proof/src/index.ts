export * from "./proof.js";
export * from "./verifier.js";
