import { describe, it, expect } from 'vitest'
import { classificationPrompt, developmentPrompt, reviewPrompt } from '../prompts.js'

const PR = {
  number: 12,
  title: 'Add parser',
  body: 'Closes #4',
  branch: 'issue-4',
  headSha: 'abc1234',
  draft: false,
  state: 'open' as const,
}

describe('developmentPrompt', () => {
  it('substitutes a placeholder for an empty issue body', () => {
    const lines = developmentPrompt({ number: 4, title: 'Parser', body: '  ' }, 'issue-4').split('\n')
    expect(lines[0]).toBe('Implement GitHub issue #4: Parser')
    expect(lines[2]).toBe('(no description)')
    expect(lines).toContain('You are on branch `issue-4` in a dedicated worktree.')
  })
})

describe('reviewPrompt', () => {
  it('includes guidance only when present', () => {
    const without = reviewPrompt(PR, '+a', '')
    const withGuidance = reviewPrompt(PR, '+a', '### Sensitivity: migrations')
    expect(without).not.toContain('### Sensitivity')
    expect(withGuidance.split('\n')).toContain('### Sensitivity: migrations')
  })

  it('asks for the findings summary line the severity parser reads', () => {
    expect(reviewPrompt(PR, '', '').split('\n')).toContain(
      'Findings: CRITICAL: <n> | HIGH: <n> | MEDIUM: <n> | LOW: <n>'
    )
  })
})

describe('classificationPrompt', () => {
  it('lists short shas and falls back when the issue is unknown', () => {
    const lines = classificationPrompt({
      branch: 'issue-4',
      issue: null,
      commits: [{ sha: 'deadbeefcafe', message: 'docs: typo', timestamp: 1, committedAt: 1 }],
      diffStat: ' README.md | 2 +-',
    }).split('\n')
    expect(lines).toContain('No issue context available')
    expect(lines).toContain('deadbee docs: typo')
    expect(lines[lines.length - 1]).toBe('Answer with ONLY ONE WORD: TRIVIAL, RELATED, or UNRELATED')
  })
})
