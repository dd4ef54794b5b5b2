export * from "./errors.js";
export * from "./scanner.js";
export * from "./parser.js";
