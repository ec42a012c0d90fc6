// Canonical test-facing exports for language-server internals.
// Keeps test imports package-based instead of reaching into ../../src paths.
export * from "./capabilities.js";
export * from "./context.js";
export * from "./handlers/custom.js";
export * from "./handlers/features.js";
export * from "./handlers/lifecycle.js";
export * from "./services/config.js";
export * from "./services/disposables.js";
export * from "./services/events.js";
export * from "./services/logger.js";
export * from "./services/server-pool.js";
