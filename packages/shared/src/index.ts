export * from "./types.js";
export * from "./areas.js";
export * from "./validators.js";
