export * from "./controller.js";
export * from "./encoding.js";
export * from "./io.js";
