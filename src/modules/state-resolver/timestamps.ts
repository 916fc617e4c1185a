/**
 * Timestamp ingestion.
 *
 * Every time value entering the pipeline (API ISO-8601 strings, git epoch
 * output, Date objects) is converted to UTC epoch seconds exactly once,
 * here. Comparisons elsewhere are plain integer comparisons.
 */

const EPOCH_SECONDS_PATTERN = /^\d{9,11}$/
const EPOCH_MILLIS_PATTERN = /^\d{12,14}$/

/**
 * Convert a timestamp to UTC epoch seconds.
 *
 * Accepts:
 *  - numbers (epoch seconds; values above 1e11 are treated as milliseconds)
 *  - digit strings in seconds or milliseconds
 *  - ISO-8601 strings with `Z` or a numeric offset
 *  - Date instances
 *
 * Returns null when the value cannot be interpreted.
 */
export function toEpochSeconds(value: string | number | Date | null | undefined): number | null {
  if (value === null || value === undefined) return null

  if (value instanceof Date) {
    const ms = value.getTime()
    return Number.isNaN(ms) ? null : Math.floor(ms / 1000)
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return null
    return value > 1e11 ? Math.floor(value / 1000) : Math.floor(value)
  }

  const trimmed = value.trim()
  if (trimmed === '') return null
  if (EPOCH_SECONDS_PATTERN.test(trimmed)) return parseInt(trimmed, 10)
  if (EPOCH_MILLIS_PATTERN.test(trimmed)) return Math.floor(parseInt(trimmed, 10) / 1000)

  // Only ISO-8601 with an explicit zone is accepted; zone-less strings would
  // be read as local time.
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i.test(trimmed)) {
    return null
  }
  const ms = Date.parse(trimmed.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'))
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000)
}

/** Current time in epoch seconds */
export function nowEpochSeconds(): number {
  return Math.floor(Date.now() / 1000)
}

/** Render epoch seconds as an ISO-8601 UTC string */
export function formatEpoch(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString()
}
