/**
 * Parsing of automation comments: review and assessment markers, severity
 * counts and finding dispositions.
 *
 * Markers are HTML comments so they stay invisible in the rendered PR:
 *   <!-- shipline-review -->
 *   <!-- shipline-assessment head=<sha> -->
 */

import type {
  AssessmentRecord,
  Comment,
  Commit,
  FindingDisposition,
  ReviewRecord,
  SeverityCounts,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Mainline sync detection
// ---------------------------------------------------------------------------

const MAINLINE_SYNC_PATTERNS: RegExp[] = [
  /^Merge branch '?(main|master|develop)'? into/i,
  /^Merge (remote-tracking )?branch '?origin\/(main|master|develop)'?/i,
  /^Merge pull request .* from .*\/(main|master|develop)\b/i,
]

/** True for merge commits that only bring mainline into the branch */
export function isMainlineSyncCommit(message: string): boolean {
  return MAINLINE_SYNC_PATTERNS.some((pattern) => pattern.test(message))
}

/** Newest commit that is not a mainline sync merge; `commits` is newest first */
export function latestQualifyingCommit(commits: Commit[]): Commit | null {
  return commits.find((commit) => !isMainlineSyncCommit(commit.message)) ?? null
}

// ---------------------------------------------------------------------------
// Markers
// ---------------------------------------------------------------------------

export function reviewMarker(tag: string): string {
  return `<!-- ${tag} -->`
}

export function assessmentMarker(tag: string, headSha: string): string {
  return `<!-- ${tag} head=${headSha} -->`
}

export function hasMarker(body: string, tag: string): boolean {
  return body.includes(`<!-- ${tag}`)
}

/** All comments carrying `tag`, oldest first */
export function markedComments(comments: Comment[], tag: string): Comment[] {
  return comments
    .filter((comment) => hasMarker(comment.body, tag))
    .sort((a, b) => a.timestamp - b.timestamp)
}

// ---------------------------------------------------------------------------
// Severity counts
// ---------------------------------------------------------------------------

const SEVERITY_LEVELS = ['critical', 'high', 'medium', 'low'] as const

/**
 * First count reported for `level`, accepting `CRITICAL: 2`, `CRITICAL (2)`,
 * `**CRITICAL**: 2` and `CRITICAL 2`. Zero when absent.
 */
export function severityCount(body: string, level: string): number {
  const pattern = new RegExp(`\\b${level}\\b\\**[\\s:]+\\(?(\\d+)\\)?`, 'i')
  const match = pattern.exec(body)
  return match?.[1] === undefined ? 0 : parseInt(match[1], 10)
}

export function parseSeverity(body: string): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, high: 0, medium: 0, low: 0 }
  for (const level of SEVERITY_LEVELS) {
    counts[level] = severityCount(body, level)
  }
  return counts
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Latest automation review, or null */
export function latestReview(comments: Comment[], tag: string): ReviewRecord | null {
  const reviews = markedComments(comments, tag)
  const latest = reviews[reviews.length - 1]
  if (latest === undefined) return null
  return { body: latest.body, timestamp: latest.timestamp, severity: parseSeverity(latest.body) }
}

const DISPOSITIONS: FindingDisposition[] = ['ACTIONABLE_NOW', 'ACTIONABLE_LATER', 'DISMISSED']

/** Count finding headings containing `### <title> - <DISPOSITION>`; trailing text is allowed */
export function countDispositions(body: string): Record<FindingDisposition, number> {
  const counts: Record<FindingDisposition, number> = {
    ACTIONABLE_NOW: 0,
    ACTIONABLE_LATER: 0,
    DISMISSED: 0,
  }
  for (const line of body.split('\n')) {
    const match = /^### .* - (ACTIONABLE_NOW|ACTIONABLE_LATER|DISMISSED)\b/.exec(line)
    const disposition = DISPOSITIONS.find((d) => d === match?.[1])
    if (disposition !== undefined) counts[disposition] += 1
  }
  return counts
}

export function parseAssessmentHead(body: string, tag: string): string | null {
  const match = new RegExp(`<!-- ${tag} head=([0-9a-f]{7,40}) -->`).exec(body)
  return match?.[1] ?? null
}

/** Latest automation assessment, or null */
export function latestAssessment(comments: Comment[], tag: string): AssessmentRecord | null {
  const assessments = markedComments(comments, tag)
  const latest = assessments[assessments.length - 1]
  if (latest === undefined) return null
  return {
    body: latest.body,
    timestamp: latest.timestamp,
    dispositions: countDispositions(latest.body),
    headSha: parseAssessmentHead(latest.body, tag),
  }
}
