export * from "./types.js";
export * from "./locator.js";
export * from "./registry-store.js";
export * from "./in-memory-registry-store.js";
export { TokenRegistry, createTokenRegistry, loadTokenRegistry } from "./token-registry.js";
export type { TokenMinter, TokenRegistryOptions } from "./token-registry.js";
