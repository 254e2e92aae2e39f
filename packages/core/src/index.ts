export * from "./types.js";
export * from "./unicode.js";
export * from "./table.js";
export * from "./scanner.js";
export * from "./normalizer.js";
export * from "./converter.js";
export * from "./validator.js";
export * from "./revert.js";
