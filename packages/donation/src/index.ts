export * from "./types.js";
export * from "./ledger-store.js";
export * from "./ledger.js";
export * from "./state-machine.js";
export * from "./journal.js";
export * from "./payment-rail.js";
export * from "./charity.js";
export * from "./store.js";
export * from "./in-memory-store.js";
export * from "./sqlite-store.js";
export * from "./orchestrator.js";
export * from "./config.js";
export * from "./service.js";
