export * from "./mod.js";
