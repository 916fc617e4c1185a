/**
 * Tests for timestamp ingestion
 */

import { describe, it, expect } from 'vitest'
import { toEpochSeconds, formatEpoch } from '../timestamps.js'

describe('toEpochSeconds', () => {
  it('normalises zone designators to the same instant', () => {
    const utc = toEpochSeconds('2024-05-01T10:00:00Z')
    expect(utc).toBe(1714557600)
    expect(toEpochSeconds('2024-05-01T12:00:00+02:00')).toBe(utc)
    expect(toEpochSeconds('2024-05-01T05:00:00-0500')).toBe(utc)
  })

  it('accepts git epoch output as a string', () => {
    expect(toEpochSeconds('1714557600')).toBe(1714557600)
  })

  it('accepts millisecond values', () => {
    expect(toEpochSeconds(1714557600123)).toBe(1714557600)
    expect(toEpochSeconds('1714557600123')).toBe(1714557600)
  })

  it('accepts Date instances', () => {
    expect(toEpochSeconds(new Date('2024-05-01T10:00:00.900Z'))).toBe(1714557600)
  })

  it('rejects zone-less and unreadable strings', () => {
    expect(toEpochSeconds('2024-05-01T10:00:00')).toBeNull()
    expect(toEpochSeconds('yesterday')).toBeNull()
    expect(toEpochSeconds('')).toBeNull()
    expect(toEpochSeconds(null)).toBeNull()
  })
})

describe('formatEpoch', () => {
  it('renders ISO-8601 UTC', () => {
    expect(formatEpoch(1714557600)).toBe('2024-05-01T10:00:00.000Z')
  })
})
