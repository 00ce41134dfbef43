import { describe, it, expect } from 'vitest'
import { filterLines, runTool } from '../src/lib/tool-runner.js'

describe('tool runner', () => {
  it('filters informational stderr lines', () => {
    const stderr = 'warn: ignoring configuration v14 for styleable Toolbar\nerror: bad resource\n'
    expect(filterLines(stderr, /ignoring configuration .* for (styleable|attribute)/))
      .toBe('error: bad resource\n')
    expect(filterLines(stderr)).toBe(stderr)
  })

  it('reports commands that cannot start', async () => {
    await expect(runTool(['/nonexistent/respack-tool', '--version']))
      .rejects.toThrow('Command failed (ENOENT): /nonexistent/respack-tool --version')
  })
})
