/**
 * Shared command setup: locate the repository, load configuration and build
 * the service context every command works against.
 */

import { join } from 'node:path'
import type { Mode } from '../../core/types.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createShiplineContext, type ShiplineContext } from '../../modules/pipeline/wiring.js'
import { findRepoRoot } from '../../modules/vcs/git-utils.js'

export interface LoadContextOptions {
  cwd: string
  /** Overrides the configured mode */
  mode?: Mode
  env?: NodeJS.ProcessEnv
}

export type ContextLoader = (options: LoadContextOptions) => Promise<ShiplineContext>

/**
 * Resolve the main clone from `cwd` (also from inside a linked worktree)
 * and load `<repo>/.shipline/config.yaml` on top of the global config.
 *
 * @throws {PreconditionError} outside a git repository
 * @throws {ConfigError} on malformed configuration
 */
export const loadShiplineContext: ContextLoader = async (options) => {
  const env = options.env ?? process.env
  const repoRoot = await findRepoRoot(options.cwd, env)
  const configSystem = createConfigSystem({
    projectConfigDir: join(repoRoot, '.shipline'),
    cliOverrides: options.mode === undefined ? {} : { mode: options.mode },
    env,
  })
  await configSystem.load()
  const config = configSystem.getConfig()
  return createShiplineContext({ config, repoRoot, mode: config.mode, env })
}
