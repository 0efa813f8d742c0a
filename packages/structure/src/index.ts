// Core types and utilities
export * from "./core/index.js";
export * from "./core/services/index.js";

// Infrastructure implementations
export * from "./infrastructure/index.js";

// Configuration
export { loadConfig, ConfigError, type CodeviewConfig } from "./config.js";

// Tool exports
export { registerAllTools, type Services } from "./tools/index.js";
