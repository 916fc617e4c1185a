/**
 * Sensitivity hints: pattern matches over a PR's changed paths and diff
 * that direct review attention to risky areas. Hints are informational:
 * they are rendered into the next review prompt and never block.
 */

import type { BlockerPatterns } from '../config/config-schema.js'
import type { SensitivityArea, SensitivityHint } from './types.js'

const GUIDANCE: Record<SensitivityArea, string> = {
  infrastructure: 'Infrastructure definitions changed. Check resource scope, permissions and blast radius.',
  migrations: 'Database migrations changed. Check reversibility, locking behaviour and possible data loss.',
  auth: 'Authentication or authorization code changed. Apply an extra security pass.',
  architecture_docs: 'Architecture documentation changed. Confirm the change matches the agreed design.',
  expensive_services: 'The diff references costly cloud services. Confirm the cost impact is intended.',
  protected_scripts: 'Workflow automation scripts changed. These changes alter the pipeline itself.',
}

function matchAny(sources: string[]): (path: string) => boolean {
  const patterns = sources.map((source) => new RegExp(source))
  return (path) => patterns.some((pattern) => pattern.test(path))
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Service names mentioned in the diff, lower-cased, sorted and unique */
export function findExpensiveServices(diff: string, services: string[]): string[] {
  if (services.length === 0 || diff === '') return []
  const pattern = new RegExp(`\\b(${services.map(escapeRegExp).join('|')})\\b`, 'gi')
  const found = new Set<string>()
  for (const match of diff.matchAll(pattern)) {
    const name = match[1]
    if (name !== undefined) found.add(name.toLowerCase())
  }
  return [...found].sort()
}

/**
 * Collect hints for a PR. Areas come out in a fixed order; an area with no
 * matches is omitted.
 */
export function detectSensitivity(files: string[], diff: string, patterns: BlockerPatterns): SensitivityHint[] {
  const isAuthExcluded = matchAny(patterns.auth_exclude)
  const pathMatchers: [SensitivityArea, (path: string) => boolean][] = [
    ['infrastructure', matchAny(patterns.infrastructure)],
    ['migrations', matchAny(patterns.migrations)],
    ['auth', (path) => !isAuthExcluded(path) && matchAny(patterns.auth)(path)],
    ['architecture_docs', matchAny(patterns.architecture_docs)],
  ]

  const hints: SensitivityHint[] = []
  for (const [area, matches] of pathMatchers) {
    const hits = files.filter(matches)
    if (hits.length > 0) hints.push({ area, matches: hits })
  }

  const services = findExpensiveServices(diff, patterns.expensive_services)
  if (services.length > 0) hints.push({ area: 'expensive_services', matches: services })

  const scripts = files.filter((path) => patterns.protected_scripts.some((script) => path.includes(script)))
  if (scripts.length > 0) hints.push({ area: 'protected_scripts', matches: scripts })

  return hints
}

/** Guidance markdown for the review prompt; '' when there are no hints */
export function renderSensitivityGuidance(hints: SensitivityHint[]): string {
  return hints
    .map((hint) =>
      [
        `### Sensitivity: ${hint.area}`,
        '',
        GUIDANCE[hint.area],
        '',
        ...hint.matches.map((match) => `- \`${match}\``),
      ].join('\n')
    )
    .join('\n\n')
}
