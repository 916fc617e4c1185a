/**
 * Barrel exports for the vcs module.
 */

export { createGitClient, GitClientImpl } from './git-client-impl.js'
export type { GitClientOptions } from './git-client-impl.js'
export type { GitClient, IntegrateResult, LogOptions, PushOptions, PushResult } from './git-client.js'
export { spawnGit, parseCommitLog, splitLines, findRepoRoot, COMMIT_LOG_FORMAT } from './git-utils.js'
export type { GitSpawnResult, SpawnOptions } from './git-utils.js'
