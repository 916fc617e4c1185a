/**
 * Pulls security-relevant findings out of an automation review body.
 */

const FINDING_PATTERN =
  /(CRITICAL|HIGH|MEDIUM).*(security|auth|tenant|validation|sql|xss|csrf|injection|leak)/i

/** Lines kept after each matching line */
const CONTEXT_LINES = 5
const MAX_LINES = 50

/**
 * Matching lines with their following context. Separate groups are joined
 * by a `--` line; the result is capped at 50 lines.
 */
export function extractSecurityFindings(reviewBody: string): string[] {
  const lines = reviewBody.split('\n')
  const keep = new Set<number>()
  lines.forEach((line, index) => {
    if (!FINDING_PATTERN.test(line)) return
    for (let i = index; i <= Math.min(index + CONTEXT_LINES, lines.length - 1); i++) keep.add(i)
  })

  const out: string[] = []
  let previous = -1
  for (const index of [...keep].sort((a, b) => a - b)) {
    if (previous !== -1 && index !== previous + 1) out.push('--')
    out.push(lines[index] ?? '')
    previous = index
  }
  return out.slice(0, MAX_LINES)
}
