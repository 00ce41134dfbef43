import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import JSZip from 'jszip'
import { extractArchive, extractDependencies, sortArchive } from '../src/lib/archive.js'
import { listFiles } from '../src/lib/tree.js'

async function writeZip(path: string, files: [string, string][]): Promise<void> {
  const zip = new JSZip()
  for (const [name, content] of files) zip.file(name, content)
  await writeFile(path, await zip.generateAsync({ type: 'nodebuffer' }))
}

describe('archive', () => {
  const dirs: string[] = []

  afterEach(async () => {
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  async function setupDir(): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), 'respack-archive-'))
    dirs.push(dir)
    return dir
  }

  it('extracts every file', async () => {
    const dir = await setupDir()
    const zipPath = join(dir, 'base.zip')
    await writeZip(zipPath, [['values/strings.xml', '<resources/>'], ['drawable/icon.png', 'png']])

    const names = await extractArchive(zipPath, join(dir, 'out'))
    expect(names).toEqual(['drawable/icon.png', 'values/strings.xml'])
    expect(await readFile(join(dir, 'out/values/strings.xml'), 'utf-8')).toBe('<resources/>')
  })

  it('reports a missing archive', async () => {
    const dir = await setupDir()
    await expect(extractArchive(join(dir, 'absent.zip'), dir))
      .rejects.toThrow(`Dependency archive not found: ${join(dir, 'absent.zip')}`)
  })

  it('extracts each dependency into its own directory', async () => {
    const dir = await setupDir()
    await writeZip(join(dir, 'base.zip'), [['values/strings.xml', 'a']])
    await writeZip(join(dir, 'feature.zip'), [['values/strings.xml', 'b']])

    const subdirs = await extractDependencies([join(dir, 'base.zip'), join(dir, 'feature.zip')], join(dir, 'deps'))
    expect(subdirs).toEqual([join(dir, 'deps/base'), join(dir, 'deps/feature')])
    expect(await listFiles(join(dir, 'deps'))).toEqual(['base/values/strings.xml', 'feature/values/strings.xml'])
  })

  it('rejects two dependencies with the same name', async () => {
    const dir = await setupDir()
    await writeZip(join(dir, 'base.zip'), [['values/strings.xml', 'a']])
    await expect(extractDependencies([join(dir, 'base.zip'), join(dir, 'base.zip')], join(dir, 'deps')))
      .rejects.toThrow('Resource archive name conflict: base.zip')
  })

  it('orders entries by name', async () => {
    const dir = await setupDir()
    await writeZip(join(dir, 'partial.zip'), [['values_strings.arsc.flat', 'v'], ['drawable_icon.png.flat', 'd']])

    await sortArchive(join(dir, 'partial.zip'), join(dir, 'partial.sorted.zip'))
    const sorted = await JSZip.loadAsync(await readFile(join(dir, 'partial.sorted.zip')))
    expect(Object.keys(sorted.files)).toEqual(['drawable_icon.png.flat', 'values_strings.arsc.flat'])
    const entry = sorted.file('values_strings.arsc.flat')
    expect(entry === null ? null : await entry.async('string')).toBe('v')
  })
})
