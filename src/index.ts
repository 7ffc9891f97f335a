export * from "./clock/timezone.js";
export * from "./policy/types.js";
export * from "./policy/quiet-hours.js";
export * from "./policy/similarity.js";
export { PolicyEngine } from "./policy/engine.js";
export * from "./policy/content-filter.js";
export * from "./cadence/scheduler.js";
export * from "./conversation/types.js";
export * from "./conversation/commands.js";
export * from "./conversation/consent.js";
export * from "./conversation/notices.js";
export * from "./conversation/persona.js";
export * from "./conversation/state-machine.js";
export type * from "./store/types.js";
export { StoreDB } from "./store/db.js";
export { SqliteConversationStore } from "./store/sqlite-store.js";
export type * from "./generation/types.js";
export { OfflineResponder, offlineReply } from "./generation/offline.js";
export { OpenAIGenerator } from "./generation/openai.js";
export { ResilientGenerator } from "./generation/resilient.js";
export { createGenerator } from "./generation/factory.js";
export * from "./channels/adapter.js";
export { ChannelRegistry } from "./channels/registry.js";
export { createAdapter } from "./channels/factory.js";
export * from "./dispatch/loop.js";
export { buildEngine, type Engine, type EngineDeps } from "./gateway/engine.js";
export { startGateway, type GatewayContext } from "./gateway/lifecycle.js";
export { HealthServer } from "./gateway/health.js";
export { loadConfig, parseConfigText, ConfigError } from "./config/loader.js";
export { getStateDir, getConfigPath, resolveDatabasePath } from "./config/paths.js";
export { parseConfig, amicusConfigSchema, DEFAULT_PERSONA_ID } from "./config/schema.js";
export type * from "./config/types.js";
export { createLogger, createSilentLogger, type Logger } from "./logging/logger.js";
