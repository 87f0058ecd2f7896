/**
 * Pagesmith - Main module exports
 * Public API surface for embedding the engine
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger } from './utils/logger.js'
export * from './utils/helpers.js'

// Engine
export { createEngine } from './core/engine-impl.js'
export type { Engine, EngineOptions, EngineStatus, HealthReport } from './core/engine.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { EngineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Stages
export * from './modules/config/index.js'
export * from './modules/status-store/index.js'
export * from './modules/code-generation/index.js'
export * from './modules/repository/index.js'
export * from './modules/pages/index.js'
export * from './modules/callback/index.js'
export * from './modules/task-orchestrator/index.js'
