/**
 * Public API: the probe → plan → execute → report pipeline, its types, and
 * the building blocks (package managers, actions) it is made of.
 */
export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/engine.js";
export * from "./core/platform.js";
export * from "./core/probe.js";
export * from "./core/manifest.js";
export * from "./core/planner.js";
export * from "./core/executor.js";
export * from "./core/reporter.js";
export * from "./core/logger.js";
export * from "./core/package-manager.js";
export * from "./lib/exec.js";
export * from "./modules/index.js";
