import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { ledgerMergeCommand, ledgerResolveCommand } from '../src/commands/ledger.js'

describe('respack ledger', () => {
  const dirs: string[] = []
  let dir: string

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'log').mockImplementation(() => {})
    dir = await mkdtemp(join(tmpdir(), 'respack-ledger-cmd-'))
    dirs.push(dir)
    await writeFile(join(dir, 'a.info'), 'Rename:values-tl/strings.xml,values-fil/strings.xml\n')
    await writeFile(join(dir, 'b.info'), 'Rename:drawable/icon.webp,drawable-mdpi/icon.webp\nRename:drawable-mdpi/icon.webp,drawable-mdpi/icon.png\nRename:values-tl/strings.xml,values-fil/strings.xml\n')
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  it('merges ledgers', async () => {
    const output = join(dir, 'merged.info')
    const result = await ledgerMergeCommand(output, [join(dir, 'a.info'), join(dir, 'b.info')])
    expect(result).toEqual({ ok: true, value: 3 })
    expect(await readFile(output, 'utf-8')).toBe(
      'Rename:drawable-mdpi/icon.webp,drawable-mdpi/icon.png\n' +
      'Rename:drawable/icon.webp,drawable-mdpi/icon.webp\n' +
      'Rename:values-tl/strings.xml,values-fil/strings.xml\n',
    )
  })

  it('reports missing and malformed ledgers', async () => {
    expect(await ledgerMergeCommand(join(dir, 'out.info'), [join(dir, 'none.info')]))
      .toEqual({ ok: false, error: `Ledger not found: ${join(dir, 'none.info')}` })

    await writeFile(join(dir, 'bad.info'), 'Rename:values-tl/strings.xml\n')
    expect(await ledgerMergeCommand(join(dir, 'out.info'), [join(dir, 'bad.info')]))
      .toEqual({ ok: false, error: `Malformed rename record in ${join(dir, 'bad.info')}: Rename:values-tl/strings.xml` })
  })

  it('resolves a packaged path to its origin', async () => {
    const result = await ledgerResolveCommand(join(dir, 'b.info'), 'drawable/icon.webp')
    expect(result).toEqual({ ok: true, value: 'drawable-mdpi/icon.png' })
    expect(console.log).toHaveBeenCalledWith('drawable-mdpi/icon.png')
  })
})
