export * from "./actions.js";
export * from "./client.js";
export * from "./encoding.js";
export * from "./errors.js";
export * from "./executor.js";
export * from "./server.js";
export * from "./topics.js";
