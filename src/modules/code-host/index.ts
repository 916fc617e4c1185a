/**
 * Barrel exports for the code-host module.
 */

export type { CodeHost, CreatePullRequestInput, MergeOutcome } from './code-host.js'
export {
  GhCodeHost,
  createGhCodeHost,
  closesIssue,
  titleReferences,
  pickPullRequestForIssue,
} from './gh-code-host.js'
export type { GhCodeHostOptions } from './gh-code-host.js'
