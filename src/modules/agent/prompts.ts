/**
 * Prompt builders for each agent task.
 *
 * The orchestrator, not the agent, posts review and assessment comments,
 * so these prompts ask for markdown on stdout and never for `gh` calls.
 */

import type { Commit, Issue, PullRequest } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Development and fixes
// ---------------------------------------------------------------------------

export function developmentPrompt(issue: Issue, branch: string): string {
  return [
    `Implement GitHub issue #${String(issue.number)}: ${issue.title}`,
    '',
    issue.body.trim() === '' ? '(no description)' : issue.body.trim(),
    '',
    `You are on branch \`${branch}\` in a dedicated worktree.`,
    'Write the code and tests the issue needs, then commit with conventional commit messages.',
    'Do not push and do not open a pull request.',
  ].join('\n')
}

export function fixPrompt(pr: PullRequest, assessment: string): string {
  return [
    `Address the ACTIONABLE_NOW findings from the assessment of PR #${String(pr.number)} (${pr.title}).`,
    '',
    'Assessment:',
    assessment.trim(),
    '',
    'Fix only items marked ACTIONABLE_NOW. Commit the result with the message',
    '"fix: address review findings". Do not push.',
  ].join('\n')
}

// ---------------------------------------------------------------------------
// Review and assessment
// ---------------------------------------------------------------------------

export function reviewPrompt(pr: PullRequest, diff: string, guidance: string): string {
  const sections = [
    `Review pull request #${String(pr.number)}: ${pr.title}`,
    '',
    'Classify every finding as CRITICAL, HIGH, MEDIUM, or LOW.',
    'Start the review with one summary line in exactly this form:',
    'Findings: CRITICAL: <n> | HIGH: <n> | MEDIUM: <n> | LOW: <n>',
    'Then list each finding under a `### <SEVERITY>: <title>` heading.',
  ]
  if (guidance.trim() !== '') {
    sections.push('', guidance.trim())
  }
  sections.push('', 'Diff:', '```diff', diff, '```')
  return sections.join('\n')
}

export function assessmentPrompt(pr: PullRequest, review: string): string {
  return [
    `Assess the review of pull request #${String(pr.number)}: ${pr.title}`,
    '',
    'For each finding write one block:',
    '### <brief title> - <ACTIONABLE_NOW|ACTIONABLE_LATER|DISMISSED>',
    '**Severity:** <CRITICAL|HIGH|MEDIUM|LOW>',
    '<one paragraph of reasoning>',
    '',
    'ACTIONABLE_NOW: CRITICAL security issues always; bugs and HIGH issues fixable in this PR.',
    'ACTIONABLE_LATER: valid but out of scope for this PR.',
    'DISMISSED: incorrect, duplicate, or stylistic.',
    '',
    'Review:',
    review.trim(),
  ].join('\n')
}

// ---------------------------------------------------------------------------
// Divergence classification
// ---------------------------------------------------------------------------

export interface ClassificationContext {
  branch: string
  issue: Issue | null
  commits: Commit[]
  diffStat: string
}

export function classificationPrompt(ctx: ClassificationContext): string {
  const issueText =
    ctx.issue === null
      ? 'No issue context available'
      : `Issue #${String(ctx.issue.number)}: ${ctx.issue.title}\n${ctx.issue.body}`
  return [
    'You are classifying foreign commits found on a PR branch.',
    '',
    'Issue context:',
    issueText,
    '',
    `PR branch: ${ctx.branch}`,
    '',
    'Foreign commits found on remote but not on local working copy:',
    ...ctx.commits.map((c) => `${c.sha.slice(0, 7)} ${c.message}`),
    '',
    'Diff summary:',
    ctx.diffStat,
    '',
    'Classify ALL foreign commits together as ONE of these categories:',
    '- TRIVIAL: Non-functional changes only (docs, comments, formatting, renames, dependency bumps, mainline sync). No logic changes.',
    '- RELATED: Changes that implement, fix, or extend the same issue described above.',
    '- UNRELATED: Changes for a different issue, feature, or unknown origin.',
    '',
    'Answer with ONLY ONE WORD: TRIVIAL, RELATED, or UNRELATED',
  ].join('\n')
}
