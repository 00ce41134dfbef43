import { mkdir } from 'node:fs/promises'
import { basename, join } from 'node:path'
import pLimit from 'p-limit'
import { PipelineError } from 'shared'
import { sortArchive } from './archive.js'
import { formatPackageId } from './package-id.js'
import { idResources } from './r-txt.js'
import type { ToolRunner } from './tool-runner.js'

/**
 * Some dependencies carry resources for API levels below the minimum. The
 * compiler skips them and says so; that is not worth reporting.
 */
export const IGNORABLE_COMPILE_WARNINGS = /ignoring configuration .* for (styleable|attribute)/

export interface LinkRequest {
  linker: string
  manifest: string
  manifestPackage: string
  partials: string[]
  minSdkVersion: number
  targetSdkVersion: number
  rTxtPath: string
  includeResources?: string[]
  versionCode?: string
  versionName?: string
  proguardPath?: string
  proguardMainDexPath?: string
  emitIdsPath?: string
  sharedLib?: boolean
  noXmlNamespaces?: boolean
  packageId?: number | null
  stableIdsPath?: string
  /** Intermediate structured output. Takes precedence over `arscPath` for the link itself. */
  protoPath?: string
  arscPath?: string
}

export interface OptimizeRequest {
  linker: string
  input: string
  output: string
  obfuscationConfigPath?: string
  shortenPaths?: boolean
  pathMapPath?: string
}

/**
 * Compile each dependency directory into a partial archive, in parallel, and
 * return the name-sorted partials in input order.
 */
export async function compileDependencies(
  linker: string,
  dependencyDirs: string[],
  partialsDir: string,
  run: ToolRunner,
  concurrency = 10,
): Promise<string[]> {
  await mkdir(partialsDir, { recursive: true })
  const limit = pLimit(concurrency)

  const settled = await Promise.allSettled(dependencyDirs.map(dir => limit(async () => {
    const name = basename(dir)
    const partial = join(partialsDir, `${name}.zip`)
    await run([linker, 'compile', '--dir', dir, '-o', partial], {
      stderrFilter: IGNORABLE_COMPILE_WARNINGS,
      printStderr: true,
    })
    const sorted = join(partialsDir, `${name}.sorted.zip`)
    await sortArchive(partial, sorted)
    return sorted
  })))

  const partials: string[] = []
  for (const outcome of settled) {
    if (outcome.status === 'rejected') throw outcome.reason
    partials.push(outcome.value)
  }
  return partials
}

export function buildLinkCommand(request: LinkRequest): string[] {
  const command = [
    request.linker,
    'link',
    '--auto-add-overlay',
    '--no-version-vectors',
    '--min-sdk-version', String(request.minSdkVersion),
    '--target-sdk-version', String(request.targetSdkVersion),
  ]

  for (const jar of request.includeResources ?? []) {
    command.push('-I', jar)
  }
  if (request.versionCode) command.push('--version-code', request.versionCode)
  if (request.versionName) command.push('--version-name', request.versionName)
  if (request.proguardPath) command.push('--proguard', request.proguardPath)
  if (request.proguardMainDexPath) command.push('--proguard-main-dex', request.proguardMainDexPath)
  if (request.emitIdsPath) command.push('--emit-ids', request.emitIdsPath)
  command.push('--output-text-symbols', request.rTxtPath)

  // Only one of --proto-format and --shared-lib is accepted.
  if (request.sharedLib && !request.protoPath) command.push('--shared-lib')
  if (request.noXmlNamespaces) command.push('--no-xml-namespaces')

  if (request.packageId !== undefined && request.packageId !== null) {
    command.push('--package-id', formatPackageId(request.packageId), '--allow-reserved-package-id')
  }

  command.push('--manifest', request.manifest, '--rename-manifest-package', request.manifestPackage)
  if (request.stableIdsPath) command.push('--stable-ids', request.stableIdsPath)

  for (const partial of request.partials) {
    command.push('-R', partial)
  }

  if (request.protoPath) {
    command.push('--proto-format', '-o', request.protoPath)
  } else if (request.arscPath) {
    command.push('-o', request.arscPath)
  } else {
    throw new PipelineError('ConfigurationContradiction', 'Link needs an arsc or proto output path')
  }
  return command
}

export function buildConvertCommand(linker: string, protoPath: string, arscPath: string): string[] {
  return [linker, 'convert', '-o', arscPath, protoPath]
}

export function buildOptimizeCommand(request: OptimizeRequest): string[] {
  const command = [request.linker, 'optimize', request.input, '-o', request.output]
  if (request.obfuscationConfigPath) {
    command.push('--enable-resource-obfuscation', '--resources-config-path', request.obfuscationConfigPath)
  }
  if (request.shortenPaths) command.push('--enable-resource-path-shortening')
  if (request.pathMapPath) command.push('--resource-path-shortening-map', request.pathMapPath)
  return command
}

export interface DumpedPackage {
  name: string
  id: number
}

/**
 * Read the first `Package name=<name> id=<hex>` line of a resource dump.
 */
export function parseDumpedPackage(output: string, archive = 'archive'): DumpedPackage {
  const match = output.match(/^Package name=(\S+) id=([0-9a-fA-F]+)/m)
  if (!match) {
    throw new PipelineError('MalformedResource', `Failed to find the resource package of ${archive}`)
  }
  return { name: match[1], id: Number.parseInt(match[2], 16) }
}

export async function dumpPackage(linker: string, archive: string, run: ToolRunner): Promise<DumpedPackage> {
  const { stdout } = await run([linker, 'dump', 'resources', archive])
  return parseDumpedPackage(stdout, archive)
}

/**
 * Point every line of another package's `--emit-ids` output at this run's
 * package so it can seed `--stable-ids`.
 */
export function rewriteStableIds(text: string, packageName: string): string {
  return text.replace(/^.*?:/gm, `${packageName}:`)
}

/**
 * Optimizer config: the user's rules plus a `#no_obfuscate` rule for every
 * `id` resource of the symbol listing.
 */
export function buildObfuscationConfig(baseConfig: string, symbols: string): string {
  let config = baseConfig
  if (config.length > 0 && !config.endsWith('\n')) config += '\n'
  for (const resource of idResources(symbols)) {
    config += `${resource}#no_obfuscate\n`
  }
  return config
}
