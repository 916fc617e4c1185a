import { describe, it, expect } from 'vitest'
import { extractSecurityFindings } from '../security-findings.js'

describe('extractSecurityFindings', () => {
  it('keeps matching lines with five lines of context, separating groups', () => {
    const body = [
      'Summary',
      'CRITICAL: SQL injection in search',
      'use params',
      '',
      'LOW: naming',
      'x',
      'y',
      'z',
      'w',
      'HIGH: auth token leak',
      'rotate',
    ].join('\n')

    expect(extractSecurityFindings(body)).toEqual([
      'CRITICAL: SQL injection in search',
      'use params',
      '',
      'LOW: naming',
      'x',
      'y',
      '--',
      'HIGH: auth token leak',
      'rotate',
    ])
  })

  it('ignores severities without a security keyword', () => {
    expect(extractSecurityFindings('HIGH: slow loop\nMEDIUM: naming')).toEqual([])
  })

  it('caps the output at 50 lines', () => {
    const body = Array.from({ length: 80 }, (_, i) => `MEDIUM: missing validation ${String(i)}`).join('\n')
    expect(extractSecurityFindings(body)).toHaveLength(50)
  })
})
