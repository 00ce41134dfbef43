import { describe, it, expect } from 'vitest'
import { PipelineRun, RUN_STATES } from '../src/lib/run-state.js'

describe('PipelineRun', () => {
  it('walks every state in order', () => {
    const run = new PipelineRun()
    for (const state of RUN_STATES.slice(1)) run.advance(state)
    expect(run.state).toBe('Finalized')
  })

  it('refuses to skip a state', () => {
    const run = new PipelineRun()
    expect(() => run.advance('Normalized'))
      .toThrow('Run cannot move from Started to Normalized (next is Extracted)')
    expect(run.state).toBe('Started')
  })

  it('has nothing after Finalized', () => {
    const run = new PipelineRun()
    for (const state of RUN_STATES.slice(1)) run.advance(state)
    expect(() => run.advance('Finalized')).toThrow('Run cannot move from Finalized to Finalized')
  })
})
