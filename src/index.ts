export { loadConfig, parseConfig, resolveConfigPath } from "./config.js";
export type { MemoryLakeConfig, MemorySettings, SummarizerSettings } from "./config.js";
export { createLogger, createLoggerFromConfig, createSilentLogger, type Logger } from "./log.js";
export { OpenAIClient } from "./runtime/openai.js";
export * from "./memory/index.js";
