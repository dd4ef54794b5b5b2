// tinysheet core - stylesheet subset parser
export * from "./model/index.js";
export * from "./parser/index.js";
export * from "./diagnostics/index.js";
export * from "./display/index.js";
