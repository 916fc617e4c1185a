/**
 * Divergence decision matrix: pure mapping from (classification,
 * reviewed, mode) to what the resolver does.
 *
 * | classification | reviewed | mode       | action                              |
 * |----------------|----------|------------|-------------------------------------|
 * | TRIVIAL        | any      | any        | rebase + push                       |
 * | RELATED        | yes      | any        | rebase + push                       |
 * | RELATED        | no       | unattended | block, notify                       |
 * | RELATED        | no       | attended   | offer re-review / pull / force / abort |
 * | UNRELATED      | any      | unattended | block, notify                       |
 * | UNRELATED      | any      | attended   | offer force / abort, notify         |
 */

import type { Mode } from '../../core/types.js'
import type { Classification } from './types.js'

export type OperatorOption = 'pull-and-re-review' | 'pull-without-review' | 'force-push-local' | 'abort'

export type DivergenceAction =
  | { action: 'rebase-and-push' }
  | { action: 'block'; blocker: 'unreviewed_divergence' | 'unrelated_divergence' }
  | { action: 'offer'; options: OperatorOption[] }

export interface DivergenceDecision {
  step: DivergenceAction
  notify: boolean
}

export function decideDivergence(
  classification: Classification,
  reviewed: boolean,
  mode: Mode
): DivergenceDecision {
  switch (classification) {
    case 'TRIVIAL':
      return { step: { action: 'rebase-and-push' }, notify: false }
    case 'RELATED':
      if (reviewed) return { step: { action: 'rebase-and-push' }, notify: false }
      return mode === 'unattended'
        ? { step: { action: 'block', blocker: 'unreviewed_divergence' }, notify: true }
        : {
            step: {
              action: 'offer',
              options: ['pull-and-re-review', 'pull-without-review', 'force-push-local', 'abort'],
            },
            notify: false,
          }
    case 'UNRELATED':
      return mode === 'unattended'
        ? { step: { action: 'block', blocker: 'unrelated_divergence' }, notify: true }
        : { step: { action: 'offer', options: ['force-push-local', 'abort'] }, notify: true }
  }
}
