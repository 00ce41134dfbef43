import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import JSZip from 'jszip'
import {
  buildConvertCommand,
  buildLinkCommand,
  buildObfuscationConfig,
  buildOptimizeCommand,
  compileDependencies,
  IGNORABLE_COMPILE_WARNINGS,
  parseDumpedPackage,
  rewriteStableIds,
} from '../src/lib/linker.js'
import type { ToolRunner, ToolRunOptions } from '../src/lib/tool-runner.js'

const BASE = {
  linker: 'aapt2',
  manifest: '/work/AndroidManifest.xml',
  manifestPackage: 'org.example.app',
  partials: ['/work/partials/base.sorted.zip', '/work/partials/feature.sorted.zip'],
  minSdkVersion: 21,
  targetSdkVersion: 34,
  rTxtPath: '/work/R.txt',
}

describe('buildLinkCommand', () => {
  it('builds the minimal link', () => {
    expect(buildLinkCommand({ ...BASE, arscPath: '/work/resources.ap_' })).toEqual([
      'aapt2', 'link', '--auto-add-overlay', '--no-version-vectors',
      '--min-sdk-version', '21', '--target-sdk-version', '34',
      '--output-text-symbols', '/work/R.txt',
      '--manifest', '/work/AndroidManifest.xml', '--rename-manifest-package', 'org.example.app',
      '-R', '/work/partials/base.sorted.zip', '-R', '/work/partials/feature.sorted.zip',
      '-o', '/work/resources.ap_',
    ])
  })

  it('adds every optional flag in order', () => {
    const command = buildLinkCommand({
      ...BASE,
      partials: ['/work/partials/base.sorted.zip'],
      includeResources: ['/sdk/android.jar'],
      versionCode: '42',
      versionName: '1.2',
      proguardPath: '/work/proguard.txt',
      emitIdsPath: '/work/emitted-ids.txt',
      sharedLib: true,
      noXmlNamespaces: true,
      packageId: 0x7e,
      stableIdsPath: '/work/stable-ids.txt',
      arscPath: '/work/resources.ap_',
    })
    expect(command).toEqual([
      'aapt2', 'link', '--auto-add-overlay', '--no-version-vectors',
      '--min-sdk-version', '21', '--target-sdk-version', '34',
      '-I', '/sdk/android.jar',
      '--version-code', '42', '--version-name', '1.2',
      '--proguard', '/work/proguard.txt',
      '--emit-ids', '/work/emitted-ids.txt',
      '--output-text-symbols', '/work/R.txt',
      '--shared-lib', '--no-xml-namespaces',
      '--package-id', '0x7e', '--allow-reserved-package-id',
      '--manifest', '/work/AndroidManifest.xml', '--rename-manifest-package', 'org.example.app',
      '--stable-ids', '/work/stable-ids.txt',
      '-R', '/work/partials/base.sorted.zip',
      '-o', '/work/resources.ap_',
    ])
  })

  it('links proto format without --shared-lib', () => {
    const command = buildLinkCommand({
      ...BASE,
      sharedLib: true,
      protoPath: '/work/resources.proto.ap_',
      arscPath: '/work/resources.ap_',
    })
    expect(command).not.toContain('--shared-lib')
    expect(command.slice(-3)).toEqual(['--proto-format', '-o', '/work/resources.proto.ap_'])
  })

  it('needs an output', () => {
    expect(() => buildLinkCommand(BASE)).toThrow('Link needs an arsc or proto output path')
  })
})

describe('convert and optimize', () => {
  it('converts proto to arsc', () => {
    expect(buildConvertCommand('aapt2', '/w/r.proto.ap_', '/w/r.ap_'))
      .toEqual(['aapt2', 'convert', '-o', '/w/r.ap_', '/w/r.proto.ap_'])
  })

  it('optimizes with obfuscation and path shortening', () => {
    expect(buildOptimizeCommand({
      linker: 'aapt2',
      input: '/w/r.ap_',
      output: '/w/r.optimized.ap_',
      obfuscationConfigPath: '/w/optimize.config',
      shortenPaths: true,
      pathMapPath: '/w/path-map.txt',
    })).toEqual([
      'aapt2', 'optimize', '/w/r.ap_', '-o', '/w/r.optimized.ap_',
      '--enable-resource-obfuscation', '--resources-config-path', '/w/optimize.config',
      '--enable-resource-path-shortening',
      '--resource-path-shortening-map', '/w/path-map.txt',
    ])
  })

  it('keeps id resources readable', () => {
    const symbols = 'int id toolbar 0x7f020000\nint string app_name 0x7f010000\nint id fab 0x7f020001\n'
    expect(buildObfuscationConfig('string/app_name#no_collapse', symbols))
      .toBe('string/app_name#no_collapse\nid/toolbar#no_obfuscate\nid/fab#no_obfuscate\n')
    expect(buildObfuscationConfig('', '')).toBe('')
  })
})

describe('package dumps', () => {
  it('reads the package line', () => {
    const output = 'Binary APK\nPackage name=org.example.app id=7f\n  type string id=01 entryCount=1\n'
    expect(parseDumpedPackage(output)).toEqual({ name: 'org.example.app', id: 0x7f })
  })

  it('fails without a package line', () => {
    expect(() => parseDumpedPackage('Binary APK\n', '/w/r.ap_'))
      .toThrow('Failed to find the resource package of /w/r.ap_')
  })

  it('rewrites stable IDs to this package', () => {
    const ids = 'org.example.base:string/app_name = 0x7f010000\norg.example.base:id/toolbar = 0x7f020000\n'
    expect(rewriteStableIds(ids, 'org.example.app'))
      .toBe('org.example.app:string/app_name = 0x7f010000\norg.example.app:id/toolbar = 0x7f020000\n')
  })
})

describe('compileDependencies', () => {
  const dirs: string[] = []

  afterEach(async () => {
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  it('compiles each dependency into a sorted partial', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'respack-linker-'))
    dirs.push(dir)
    const calls: { command: string[]; options?: ToolRunOptions }[] = []
    const run: ToolRunner = async (command, options) => {
      calls.push({ command, options })
      const zip = new JSZip()
      zip.file('values_strings.arsc.flat', 'flat')
      await writeFile(command[5], await zip.generateAsync({ type: 'nodebuffer' }))
      return { stdout: '', stderr: '' }
    }

    const partialsDir = join(dir, 'partials')
    const partials = await compileDependencies('aapt2', [join(dir, 'deps/base'), join(dir, 'deps/feature')], partialsDir, run)
    expect(partials).toEqual([join(partialsDir, 'base.sorted.zip'), join(partialsDir, 'feature.sorted.zip')])
    expect(calls.map(c => c.command)).toEqual([
      ['aapt2', 'compile', '--dir', join(dir, 'deps/base'), '-o', join(partialsDir, 'base.zip')],
      ['aapt2', 'compile', '--dir', join(dir, 'deps/feature'), '-o', join(partialsDir, 'feature.zip')],
    ])
    expect(calls[0].options?.stderrFilter).toBe(IGNORABLE_COMPILE_WARNINGS)
  })

  it('propagates compile failures', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'respack-linker-'))
    dirs.push(dir)
    const run: ToolRunner = async () => {
      throw new Error('compile exploded')
    }
    await expect(compileDependencies('aapt2', [join(dir, 'deps/base')], join(dir, 'partials'), run))
      .rejects.toThrow('compile exploded')
  })
})
