export * from "./entries.js";
export * from "./ids.js";
export * from "./ledger.js";
export * from "./monitor.js";
export * from "./notifications.js";
