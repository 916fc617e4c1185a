/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, readEnvOverrides } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export { ShiplineConfigSchema, PartialShiplineConfigSchema } from './config-schema.js'
export type {
  ShiplineConfig,
  PartialShiplineConfig,
  AgentSettings,
  BlockerPatterns,
  CredentialSettings,
  MarkerSettings,
  NotesSettings,
  NotificationSettings,
  SessionSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_BLOCKER_PATTERNS } from './defaults.js'
