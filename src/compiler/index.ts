export { compilePattern } from "./pattern.js";
export { PatternRegistry, compareSpecificity, type PatternRegistryOptions } from "./registry.js";
