/**
 * General utility helpers for Shipline
 */

/**
 * Format an elapsed number of seconds as "Xh Ym Zs", "Ym Zs" or "Zs".
 * Negative input is clamped to zero.
 */
export function formatElapsed(totalSeconds: number): string {
  const secs = Math.max(0, Math.floor(totalSeconds))
  const hours = Math.floor(secs / 3600)
  const minutes = Math.floor((secs % 3600) / 60)
  const seconds = secs % 60
  if (hours > 0) return `${String(hours)}h ${String(minutes)}m ${String(seconds)}s`
  if (minutes > 0) return `${String(minutes)}m ${String(seconds)}s`
  return `${String(seconds)}s`
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Deep-merge `override` into `base`, returning a new object. Arrays and
 * scalars in `override` replace; nested plain objects merge; `undefined`
 * leaves the base value.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}
