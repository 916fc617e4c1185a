/**
 * ScriptedResolver: StateResolver that replays per-issue state sequences.
 *
 * Each script entry is a function so a state can refer to PRs created by
 * earlier steps. The last entry repeats once the others are used up.
 */

import type { PullRequest } from '../../src/core/types.js'
import type { ResolveOptions, ResolvedState, StateResolver } from '../../src/modules/state-resolver/state-resolver.js'
import type { CommitHistory, Phase } from '../../src/modules/state-resolver/types.js'

export type StateStep = () => ResolvedState

export function resolvedState(
  phase: Phase,
  pr: PullRequest | null,
  extra: Partial<ResolvedState> = {}
): ResolvedState {
  return {
    phase,
    pr,
    comments: [],
    review: null,
    assessment: null,
    history: { source: 'remote', commits: [] },
    degraded: [],
    ...extra,
  }
}

export class ScriptedResolver implements StateResolver {
  calls: { issue: number; options: ResolveOptions }[] = []
  private readonly _scripts = new Map<number, StateStep[]>()

  script(issue: number, ...steps: StateStep[]): void {
    this._scripts.set(issue, steps)
  }

  phase(): Phase {
    return { kind: 'not-started' }
  }

  async resolve(issue: number, options: ResolveOptions = {}): Promise<ResolvedState> {
    this.calls.push({ issue, options })
    const steps = this._scripts.get(issue) ?? []
    const step = steps.length > 1 ? steps.shift() : steps[0]
    if (step === undefined) throw new Error(`No scripted state for #${String(issue)}`)
    return step()
  }

  async history(): Promise<CommitHistory> {
    return { source: 'unavailable' }
  }
}
