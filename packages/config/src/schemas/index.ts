export * from "./cache.js";
export * from "./composite.js";
export * from "./environment.js";
export * from "./normalizer.js";
export * from "./regime.js";
export * from "./tension.js";
