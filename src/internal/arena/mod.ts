export { Arena } from "./arena.js";
export { NodeHandle, isNodeHandle } from "./handle.js";
export { ArenaPool } from "./pool.js";
