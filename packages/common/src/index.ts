export * from "./errors.js";
export * from "./address.js";
export * from "./amount.js";
export * from "./stable-json.js";
export * from "./logger.js";
export * from "./serial.js";
export * from "./transaction.js";
