/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.shipline/config.yaml)
 *     → project config      (<repo>/.shipline/config.yaml)
 *     → environment vars    (SHIPLINE_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { deepMerge } from '../../utils/helpers.js'
import { ConfigError, errorMessage } from '../../core/errors.js'
import {
  ShiplineConfigSchema,
  PartialShiplineConfigSchema,
  type ShiplineConfig,
  type PartialShiplineConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of SHIPLINE_ environment variable names to config paths.
 * Only scalar values can be overridden from the environment.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  SHIPLINE_LOG_LEVEL: 'log_level',
  SHIPLINE_MODE: 'mode',
  SHIPLINE_MAINLINE: 'mainline',
  SHIPLINE_MAX_ISSUES: 'session.max_issues',
  SHIPLINE_MAX_HOURS: 'session.max_hours',
  SHIPLINE_STALE_THRESHOLD: 'stale.threshold',
  SHIPLINE_AGENT_COMMAND: 'agent.command',
  SHIPLINE_AGENT_TIMEOUT: 'agent.timeout_seconds',
  SHIPLINE_SKIP_CREDENTIALS_CHECK: 'credentials.skip_check',
  SHIPLINE_NOTIFY_COMMAND: 'notifications.command',
}

function coerceEnvValue(raw: string): unknown {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  return raw
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid overrides are logged and ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialShiplineConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue

    const [section, key] = configPath.split('.')
    if (section === undefined) continue
    if (key === undefined) {
      overrides[section] = coerceEnvValue(rawValue)
      continue
    }
    const existing = overrides[section]
    const bucket: Record<string, unknown> =
      typeof existing === 'object' && existing !== null ? { ...existing } : {}
    bucket[key] = coerceEnvValue(rawValue)
    overrides[section] = bucket
  }

  const parsed = PartialShiplineConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (cursor === null || typeof cursor !== 'object') return undefined
    cursor = Object.getOwnPropertyDescriptor(cursor, part)?.value
  }
  return cursor
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: ShiplineConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialShiplineConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.shipline')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.shipline')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    const layers: PartialShiplineConfig[] = []
    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) layers.push(globalConfig)
    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) layers.push(projectConfig)
    layers.push(readEnvOverrides(this._env))
    layers.push(this._cliOverrides)

    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const result = ShiplineConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug({ mode: result.data.mode }, 'Configuration loaded successfully')
  }

  getConfig(): ShiplineConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialShiplineConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, {
        filePath,
      })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialShiplineConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
