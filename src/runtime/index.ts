export { PathwayEngine } from "./engine.js";
export { ElementNode, type NodeContent } from "./node.js";
export { matchesPath } from "./matcher.js";
