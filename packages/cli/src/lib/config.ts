import { readFile, access } from 'node:fs/promises'
import { dirname, isAbsolute, resolve } from 'node:path'
import { Ajv } from 'ajv'
import { parse as parseYaml } from 'yaml'
import { compileConfigSchema } from 'shared'
import type { CompileConfig, OutputPaths, Result, ValidationError } from 'shared'
import { OUTPUT_KEYS } from './workspace.js'

export const DEFAULT_CONFIG_FILE = 'respack.yaml'

const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile(compileConfigSchema)

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

function isCompileConfig(value: unknown): value is CompileConfig {
  return validateConfig(value)
}

/**
 * Option combinations the schema cannot express.
 */
export function checkConfig(config: CompileConfig): ValidationError[] {
  const errors: ValidationError[] = []
  const { outputs } = config

  if (!outputs.arsc && !outputs.proto) {
    errors.push({ path: 'outputs', message: 'One of outputs.arsc or outputs.proto is required' })
  }
  if (outputs.optimizedProto && !outputs.proto) {
    errors.push({ path: 'outputs.optimizedProto', message: 'outputs.optimizedProto requires outputs.proto' })
  }
  if (outputs.optimizedArsc && outputs.optimizedProto) {
    errors.push({ path: 'outputs', message: 'outputs.optimizedArsc and outputs.optimizedProto are mutually exclusive' })
  }
  if (outputs.pathMap && !config.shortResourcePaths) {
    errors.push({ path: 'outputs.pathMap', message: 'outputs.pathMap requires shortResourcePaths' })
  }
  const optimizes = Boolean(outputs.optimizedArsc || outputs.optimizedProto)
  if ((config.shortResourcePaths || config.stripResourceNames) && !optimizes) {
    errors.push({ path: 'outputs', message: 'shortResourcePaths and stripResourceNames need an optimized output' })
  }
  if (outputs.obfuscationConfig && !config.stripResourceNames) {
    errors.push({ path: 'outputs.obfuscationConfig', message: 'outputs.obfuscationConfig requires stripResourceNames' })
  }
  if (config.manifestNormalizedOut && !config.manifestExpected) {
    errors.push({ path: 'manifestNormalizedOut', message: 'manifestNormalizedOut requires manifestExpected' })
  }
  if (config.sharedResources && config.packageId) {
    errors.push({ path: 'packageId', message: 'packageId cannot be used with sharedResources' })
  }
  if (config.packageName && !config.packageNameToId) {
    errors.push({ path: 'packageName', message: 'packageName requires packageNameToId' })
  }
  if (config.minSdkVersion > config.targetSdkVersion) {
    errors.push({ path: 'minSdkVersion', message: `minSdkVersion ${config.minSdkVersion} exceeds targetSdkVersion ${config.targetSdkVersion}` })
  }
  if (config.maxSdkVersion !== undefined && config.maxSdkVersion < config.targetSdkVersion) {
    errors.push({ path: 'maxSdkVersion', message: `maxSdkVersion ${config.maxSdkVersion} is below targetSdkVersion ${config.targetSdkVersion}` })
  }
  if ((config.sharedLocaleWhitelist?.length ?? 0) > 0 && !config.sharedSymbols) {
    errors.push({ path: 'sharedLocaleWhitelist', message: 'sharedLocaleWhitelist requires sharedSymbols' })
  }
  if (config.blacklistRegex) {
    try {
      new RegExp(config.blacklistRegex)
    } catch (error) {
      errors.push({ path: 'blacklistRegex', message: `Invalid regular expression: ${error}` })
    }
  }
  return errors
}

function resolveTool(baseDir: string, tool: string): string {
  return tool.includes('/') ? resolve(baseDir, tool) : tool
}

/**
 * Make every file path in the config absolute, relative to `baseDir`.
 * Tool names without a slash are looked up on PATH and left alone.
 */
export function resolveConfigPaths(config: CompileConfig, baseDir: string): CompileConfig {
  const at = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p))
  const opt = (p: string | undefined): string | undefined => (p === undefined ? undefined : at(p))

  const outputs: OutputPaths = {}
  for (const key of OUTPUT_KEYS) {
    const value = config.outputs[key]
    if (value !== undefined) outputs[key] = at(value)
  }

  return {
    ...config,
    linker: resolveTool(baseDir, config.linker),
    webpEncoder: config.webpEncoder === undefined ? undefined : resolveTool(baseDir, config.webpEncoder),
    manifest: at(config.manifest),
    dependencies: config.dependencies.map(at),
    includeResources: config.includeResources?.map(at),
    manifestExpected: opt(config.manifestExpected),
    manifestNormalizedOut: opt(config.manifestNormalizedOut),
    sharedSymbols: opt(config.sharedSymbols),
    resourcesConfig: opt(config.resourcesConfig),
    stableIdsIn: opt(config.stableIdsIn),
    debugOutputRoot: opt(config.debugOutputRoot),
    outputs,
  }
}

/**
 * Load, validate and resolve a compile configuration file.
 */
export async function loadCompileConfig(configPath: string): Promise<Result<CompileConfig, ValidationError[]>> {
  if (!(await fileExists(configPath))) {
    return { ok: false, error: [{ path: configPath, message: `${configPath} not found` }] }
  }

  let parsed: unknown
  try {
    parsed = parseYaml(await readFile(configPath, 'utf-8'))
  } catch (error) {
    return { ok: false, error: [{ path: configPath, message: `Failed to parse ${configPath}: ${error}` }] }
  }

  if (!isCompileConfig(parsed)) {
    const schemaErrors = (validateConfig.errors ?? []).map(e => ({
      path: `config${e.instancePath}`,
      message: e.message ?? 'Unknown validation error',
    }))
    return { ok: false, error: schemaErrors }
  }

  const errors = checkConfig(parsed)
  if (errors.length > 0) {
    return { ok: false, error: errors }
  }

  return { ok: true, value: resolveConfigPaths(parsed, dirname(resolve(configPath))) }
}
