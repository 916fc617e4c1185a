/**
 * Resume procedure rendering: markdown a human follows to pick up an issue
 * after a blocker or a session limit.
 */

import type { BlockerEvent, BlockerType } from '../../core/types.js'
import { formatEpoch } from '../state-resolver/timestamps.js'
import type { Snapshot } from './schemas.js'

function blockerSteps(type: BlockerType, worktree: string): string[] {
  switch (type) {
    case 'session_limit':
      return ['Work was saved automatically. Nothing needs fixing before the next session.']
    case 'credentials_expired':
      return ['Re-authenticate with your cloud provider (for example `aws sso login`).']
    case 'critical_issues':
      return [
        'Read the CRITICAL findings in the latest review comment on the PR.',
        'Fix them, or approve the blocker when prompted on the next attended run.',
      ]
    case 'rebase_conflict':
    case 'merge_conflict':
      return [
        `Resolve the conflict by hand in \`${worktree}\` (fetch, then rebase or merge the remote branch).`,
        'Push the result once the tree builds again.',
      ]
    case 'unreviewed_divergence':
    case 'unrelated_divergence':
      return [
        'Inspect the commits on the remote branch that are missing locally.',
        'Either pull them and request a fresh review, or force-push the local branch if they are unwanted.',
      ]
    case 'head_changed':
      return ['The PR head moved after assessment. The next run re-assesses before merging.']
    default:
      return ['Review the blocker details above and clear the cause.']
  }
}

export function renderResumeProcedure(snapshot: Snapshot, blocker?: BlockerEvent): string {
  const worktree = snapshot.worktreePath ?? '(no worktree recorded)'
  const lines: string[] = [
    `## Resume issue #${String(snapshot.issue)}`,
    '',
    `- Saved: ${formatEpoch(snapshot.savedAt)} (${snapshot.reason})`,
    `- Worktree: \`${worktree}\``,
    `- Last commit: ${snapshot.lastCommit === null ? 'unknown' : `\`${snapshot.lastCommit}\``}`,
    snapshot.gitStatus.length === 0
      ? '- Working tree clean'
      : `- Uncommitted changes: ${String(snapshot.gitStatus.length)} path(s)`,
  ]

  if (blocker !== undefined) {
    lines.push('', `### Blocker: ${blocker.type}`, '', blocker.details)
  }

  const steps = blockerSteps(blocker?.type ?? snapshot.reason, worktree)
  steps.push(`Run \`shipline run ${String(snapshot.issue)}\` to continue.`)

  lines.push('', '### Steps', '')
  steps.forEach((step, i) => lines.push(`${String(i + 1)}. ${step}`))
  return lines.join('\n')
}
