import { PipelineError } from 'shared'
import type { RunState } from 'shared'

export const RUN_STATES: readonly RunState[] = [
  'Started',
  'Extracted',
  'Normalized',
  'Filtered',
  'Recompressed',
  'LedgerWritten',
  'Linked',
  'Validated',
  'Finalized',
]

/**
 * Tracks how far one packaging run got. States advance one at a time.
 */
export class PipelineRun {
  private current: RunState = 'Started'

  get state(): RunState {
    return this.current
  }

  advance(next: RunState): void {
    const expected = RUN_STATES[RUN_STATES.indexOf(this.current) + 1]
    if (next !== expected) {
      throw new PipelineError(
        'InvariantViolation',
        `Run cannot move from ${this.current} to ${next}${expected ? ` (next is ${expected})` : ''}`,
      )
    }
    this.current = next
  }
}
