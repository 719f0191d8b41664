/**
 * Multi-pass SEO validation and correction engine.
 *
 * The usual entry point is MultiPassOptimizer; every component it wires
 * together is exported for callers that assemble their own pipeline.
 */

export * from "./config/index.js";
export * from "./content/index.js";
export * from "./logging/index.js";
export * from "./cache/index.js";
export * from "./analysis/index.js";
export * from "./issues/index.js";
export * from "./correction/index.js";
export * from "./errors/index.js";
export * from "./retry/index.js";
export * from "./pipeline/index.js";
export * from "./structure/index.js";
export * from "./tracking/index.js";
export * from "./optimizer/index.js";
