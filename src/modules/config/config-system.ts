/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { ShiplineConfig, PartialShiplineConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Project-level config directory (default: <cwd>/.shipline) */
  projectConfigDir?: string
  /** Global user-level config directory (default: ~/.shipline) */
  globalConfigDir?: string
  /** Values from CLI flags; highest priority */
  cliOverrides?: PartialShiplineConfig
  /** Environment to read SHIPLINE_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   * @throws {ConfigError} on malformed YAML or schema violations
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getConfig(): ShiplineConfig

  /** Return a single value by dot-notation key (e.g. "session.max_issues") */
  get(key: string): unknown

  readonly isLoaded: boolean
}
