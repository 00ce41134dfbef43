import { access, readFile, writeFile } from 'node:fs/promises'
import { basename, resolve } from 'node:path'
import { isPipelineError, PipelineError } from 'shared'
import type { CompileConfig, Result } from 'shared'
import { extractDependencies } from '../lib/archive.js'
import { DEFAULT_CONFIG_FILE, loadCompileConfig } from '../lib/config.js'
import { recompressImages, webpEncoder, type ImageEncoder, type ImageTarget } from '../lib/image-recompressor.js'
import { RenameLedger, writeMergedLedger } from '../lib/ledger.js'
import {
  buildConvertCommand,
  buildLinkCommand,
  buildObfuscationConfig,
  buildOptimizeCommand,
  compileDependencies,
  dumpPackage,
  rewriteStableIds,
} from '../lib/linker.js'
import { readManifestPackage, verifyManifest } from '../lib/manifest.js'
import { expectedPackageId, formatPackageId, requestedPackageId, verifyPackageId } from '../lib/package-id.js'
import { loadSharedStringNames } from '../lib/r-txt.js'
import { PipelineRun } from '../lib/run-state.js'
import { runTool, type ToolRunner } from '../lib/tool-runner.js'
import { applyToDirectory, listFiles, type TransformPlan } from '../lib/tree.js'
import { createKeepPredicate, planDeletions } from '../lib/transforms/keep-filter.js'
import { planLocaleFilter, type LocalePartition } from '../lib/transforms/locale-filter.js'
import { migrateLegacyDensity } from '../lib/transforms/density-migrator.js'
import { normalizeLocales } from '../lib/transforms/locale-normalizer.js'
import { duplicateLocale, resolveLocaleDuplication } from '../lib/transforms/platform-duplicator.js'
import { createWorkspace, disposeWorkspace, publishOutputs } from '../lib/workspace.js'

export interface CompileOptions {
  config?: string
  debugDir?: string
  strictManifest?: boolean
  json?: boolean
}

/** External collaborators; tests swap in fakes. */
export interface CompileTools {
  run?: ToolRunner
  encode?: ImageEncoder
}

export interface CompileReport {
  dependencies: string[]
  partition: LocalePartition
  deleted: number
  recompressed: number
  renames: number
  packageId: string
  published: string[]
}

async function fileExists(filePath: string): Promise<boolean> {
  try { await access(filePath); return true } catch { return false }
}

async function readInput(filePath: string, what: string): Promise<string> {
  if (!(await fileExists(filePath))) {
    throw new PipelineError('MissingResource', `${what} not found: ${filePath}`)
  }
  return readFile(filePath, 'utf-8')
}

async function applyPlans(dirs: string[], plans: TransformPlan[], ledger: RenameLedger): Promise<number> {
  let edits = 0
  for (let i = 0; i < dirs.length; i++) {
    await applyToDirectory(dirs[i], plans[i].edits)
    ledger.recordAll(plans[i].renames)
    edits += plans[i].edits.length
  }
  return edits
}

async function listAll(dirs: string[]): Promise<string[][]> {
  const trees: string[][] = []
  for (const dir of dirs) trees.push(await listFiles(dir))
  return trees
}

/**
 * Merge, normalize and link the dependency resources described by `config`.
 * Nothing is written outside the workspace until every step has passed.
 */
export async function runPipeline(
  config: CompileConfig,
  run: PipelineRun,
  tools: CompileTools = {},
): Promise<CompileReport> {
  const exec = tools.run ?? runTool
  const { outputs } = config
  const label = outputs.arsc ?? outputs.proto ?? 'resources'
  const workspace = await createWorkspace(basename(label), config.debugOutputRoot)
  const { artifacts } = workspace

  try {
    const dirs = await extractDependencies(config.dependencies, workspace.depsDir)
    run.advance('Extracted')

    const ledger = new RenameLedger()
    const duplication = resolveLocaleDuplication(config.duplicateLocale)
    if (duplication) {
      const allowLists = [config.localeWhitelist ?? [], config.sharedLocaleWhitelist ?? []]
      const trees = await listAll(dirs)
      await applyPlans(dirs, trees.map(paths => duplicateLocale(paths, duplication, allowLists)), ledger)
    }
    await applyPlans(dirs, (await listAll(dirs)).map(normalizeLocales), ledger)
    run.advance('Normalized')

    const hasSharedLocales = (config.sharedLocaleWhitelist?.length ?? 0) > 0
    const sharedNames = hasSharedLocales && config.sharedSymbols
      ? await loadSharedStringNames(config.sharedSymbols)
      : new Set<string>()
    const localeFilter = planLocaleFilter(await listAll(dirs), {
      wanted: config.localeWhitelist,
      shared: config.sharedLocaleWhitelist,
      sharedNames,
      duplication,
    })
    await applyPlans(dirs, localeFilter.plans, ledger)

    const trees = await listAll(dirs)
    const keep = createKeepPredicate(trees, {
      blacklistRegex: config.blacklistRegex,
      exceptions: config.blacklistExceptions,
    })
    const deletions = trees.map(paths => ({ edits: planDeletions(paths, keep), renames: [] }))
    const deleted = await applyPlans(dirs, deletions, ledger)
    run.advance('Filtered')

    let recompressed = 0
    if (config.pngToWebp) {
      const targets: ImageTarget[] = []
      const kept = await listAll(dirs)
      kept.forEach((paths, i) => {
        for (const path of paths) targets.push({ root: dirs[i], path })
      })
      const encode = tools.encode ?? webpEncoder(config.webpEncoder ?? 'cwebp', exec)
      const renames = await recompressImages(targets, encode)
      ledger.recordAll(renames)
      recompressed = renames.length
    }
    if (config.migrateLegacyDensity !== false) {
      await applyPlans(dirs, (await listAll(dirs)).map(migrateLegacyDensity), ledger)
    }
    run.advance('Recompressed')

    await writeMergedLedger(artifacts.info, ledger, config.dependencies)
    run.advance('LedgerWritten')

    const manifestPackage = config.renameManifestPackage ?? await readManifestPackage(config.manifest)
    if (config.manifestExpected) {
      await verifyManifest({
        manifest: config.manifest,
        expected: config.manifestExpected,
        normalizedOut: config.manifestNormalizedOut ? artifacts.manifestNormalized : undefined,
        strict: config.failOnUnexpectedManifest ?? false,
      })
    }
    if (config.stableIdsIn) {
      const ids = await readInput(config.stableIdsIn, 'Stable IDs file')
      await writeFile(artifacts.stableIds, rewriteStableIds(ids, manifestPackage))
    }

    const partials = await compileDependencies(config.linker, dirs, workspace.partialsDir, exec)
    await exec(buildLinkCommand({
      linker: config.linker,
      manifest: config.manifest,
      manifestPackage,
      partials,
      minSdkVersion: config.minSdkVersion,
      targetSdkVersion: config.targetSdkVersion,
      rTxtPath: artifacts.rTxt,
      includeResources: config.includeResources,
      versionCode: config.versionCode,
      versionName: config.versionName,
      proguardPath: outputs.proguard ? artifacts.proguard : undefined,
      proguardMainDexPath: outputs.proguardMainDex ? artifacts.proguardMainDex : undefined,
      emitIdsPath: outputs.emitIds ? artifacts.emitIds : undefined,
      sharedLib: config.sharedResources,
      noXmlNamespaces: config.noXmlNamespaces,
      packageId: requestedPackageId(config),
      stableIdsPath: config.stableIdsIn ? artifacts.stableIds : undefined,
      protoPath: outputs.proto ? artifacts.proto : undefined,
      arscPath: outputs.arsc ? artifacts.arsc : undefined,
    }))

    if (outputs.proto && outputs.arsc) {
      await exec(buildConvertCommand(config.linker, artifacts.proto, artifacts.arsc))
    }

    const optimizeInput = outputs.optimizedProto ? artifacts.proto : outputs.optimizedArsc ? artifacts.arsc : null
    if (optimizeInput) {
      if (config.stripResourceNames) {
        const base = config.resourcesConfig ? await readInput(config.resourcesConfig, 'Resources config') : ''
        const symbols = await readFile(artifacts.rTxt, 'utf-8')
        await writeFile(artifacts.obfuscationConfig, buildObfuscationConfig(base, symbols))
      }
      await exec(buildOptimizeCommand({
        linker: config.linker,
        input: optimizeInput,
        output: outputs.optimizedProto ? artifacts.optimizedProto : artifacts.optimizedArsc,
        obfuscationConfigPath: config.stripResourceNames ? artifacts.obfuscationConfig : undefined,
        shortenPaths: config.shortResourcePaths,
        pathMapPath: outputs.pathMap ? artifacts.pathMap : undefined,
      }))
    }
    run.advance('Linked')

    const dumped = await dumpPackage(config.linker, outputs.arsc ? artifacts.arsc : artifacts.proto, exec)
    const expected = expectedPackageId(config)
    verifyPackageId(dumped.id, expected)
    run.advance('Validated')

    const published = await publishOutputs(workspace, {
      ...outputs,
      manifestNormalized: config.manifestNormalizedOut,
    })
    run.advance('Finalized')

    return {
      dependencies: config.dependencies,
      partition: localeFilter.partition,
      deleted,
      recompressed,
      renames: ledger.size,
      packageId: formatPackageId(dumped.id),
      published,
    }
  } finally {
    await disposeWorkspace(workspace)
  }
}

export async function compileCommand(
  options: CompileOptions,
  tools: CompileTools = {},
): Promise<Result<CompileReport, string>> {
  const configPath = resolve(options.config ?? DEFAULT_CONFIG_FILE)
  const loaded = await loadCompileConfig(configPath)
  if (!loaded.ok) {
    const messages = loaded.error.map(e => `  ${e.path}: ${e.message}`).join('\n')
    return { ok: false, error: `Invalid configuration:\n${messages}` }
  }

  const config: CompileConfig = {
    ...loaded.value,
    debugOutputRoot: options.debugDir ? resolve(options.debugDir) : loaded.value.debugOutputRoot,
    failOnUnexpectedManifest: options.strictManifest || loaded.value.failOnUnexpectedManifest,
  }

  const run = new PipelineRun()
  try {
    const report = await runPipeline(config, run, tools)
    if (options.json) {
      console.log(JSON.stringify(report, null, 2))
    } else {
      console.error(
        `✅ Linked ${report.dependencies.length} resource dependencies ` +
        `(package ${report.packageId}, ${report.renames} renames, ${report.deleted} removed, ` +
        `${report.recompressed} recompressed)`,
      )
    }
    return { ok: true, value: report }
  } catch (error) {
    if (isPipelineError(error)) {
      return { ok: false, error: `${error.kind} (after ${run.state}): ${error.message}` }
    }
    return { ok: false, error: `Failed after ${run.state}: ${error instanceof Error ? error.message : String(error)}` }
  }
}
