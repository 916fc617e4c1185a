/**
 * Credential masking for log output and pino redaction.
 *
 * The pipeline shells out to `gh` and `git` with tokens in the environment;
 * these paths keep them out of structured logs.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/** Patterns that identify forge tokens inside free text */
export const TOKEN_PATTERNS: RegExp[] = [
  // GitHub classic and fine-grained tokens
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
  /github_pat_[A-Za-z0-9_]{20,}/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/** Pino redaction paths for token-bearing fields */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  '*.token',
  'env.GH_TOKEN',
  'env.GITHUB_TOKEN',
  'env.ANTHROPIC_API_KEY',
]

/**
 * Replace any known token patterns in a string with `***`.
 *
 * Commit SHAs are 40-char hex too, so this is only applied to command
 * output that is surfaced in error messages, never to git log output.
 */
export function maskTokens(text: string): string {
  let result = text
  for (const pattern of TOKEN_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, pattern.flags), MASKED_VALUE)
  }
  return result
}
