/**
 * Shipline - Main module exports
 * Public API surface of the pipeline policy layer
 */

// Core types and errors
export * from './core/types.js'
export * from './core/errors.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { PipelineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Configuration
export * from './modules/config/index.js'

// Adapters to git and the code host
export * from './modules/vcs/index.js'
export * from './modules/code-host/index.js'

// Policy components
export * from './modules/state-resolver/index.js'
export * from './modules/divergence/index.js'
export * from './modules/blocker-gate/index.js'
export * from './modules/stale-branch/index.js'
export * from './modules/session-tracker/index.js'

// Supporting services
export * from './modules/notes/index.js'
export * from './modules/notifications/index.js'
export * from './modules/agent/index.js'
export * from './modules/prompter/index.js'

// Pipeline
export * from './modules/pipeline/index.js'
