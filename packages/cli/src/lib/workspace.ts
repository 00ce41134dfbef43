import { access, copyFile, mkdir, mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { basename, dirname, join } from 'node:path'
import { PipelineError } from 'shared'
import type { OutputPaths } from 'shared'

async function fileExists(filePath: string): Promise<boolean> {
  try { await access(filePath); return true } catch { return false }
}

export const OUTPUT_KEYS: (keyof OutputPaths)[] = [
  'arsc', 'proto', 'optimizedArsc', 'optimizedProto', 'rTxt', 'info',
  'proguard', 'proguardMainDex', 'emitIds', 'pathMap', 'obfuscationConfig',
]

/**
 * Scratch tree of one packaging run. Every artifact is produced here first and
 * only published once the whole run has succeeded.
 */
export interface Workspace {
  root: string
  depsDir: string
  partialsDir: string
  /** Kept after the run for inspection. */
  persistent: boolean
  artifacts: Required<OutputPaths> & {
    stableIds: string
    manifestNormalized: string
  }
}

/** Workspace files that can be published: the outputs plus the normalized manifest. */
export type PublishTargets = OutputPaths & { manifestNormalized?: string }

const PUBLISHED_KEYS: (keyof PublishTargets)[] = [...OUTPUT_KEYS, 'manifestNormalized']

/**
 * Create the workspace. With a debug root the tree goes to
 * `<debugRoot>/<label>`, is cleared first and survives the run.
 */
export async function createWorkspace(label: string, debugRoot?: string): Promise<Workspace> {
  let root: string
  if (debugRoot) {
    root = join(debugRoot, basename(label))
    await rm(root, { recursive: true, force: true })
    await mkdir(root, { recursive: true })
  } else {
    root = await mkdtemp(join(tmpdir(), 'respack-'))
  }

  const depsDir = join(root, 'deps')
  const partialsDir = join(root, 'partials')
  await mkdir(depsDir, { recursive: true })

  return {
    root,
    depsDir,
    partialsDir,
    persistent: Boolean(debugRoot),
    artifacts: {
      arsc: join(root, 'resources.ap_'),
      proto: join(root, 'resources.proto.ap_'),
      optimizedArsc: join(root, 'resources.optimized.ap_'),
      optimizedProto: join(root, 'resources.optimized.proto.ap_'),
      rTxt: join(root, 'R.txt'),
      info: join(root, 'resources.info'),
      proguard: join(root, 'proguard.txt'),
      proguardMainDex: join(root, 'proguard-main-dex.txt'),
      emitIds: join(root, 'emitted-ids.txt'),
      pathMap: join(root, 'path-map.txt'),
      obfuscationConfig: join(root, 'optimize.config'),
      stableIds: join(root, 'stable-ids.txt'),
      manifestNormalized: join(root, 'AndroidManifest.normalized.xml'),
    },
  }
}

export async function disposeWorkspace(workspace: Workspace): Promise<void> {
  if (workspace.persistent) {
    console.error(`Workspace kept at ${workspace.root}`)
    return
  }
  await rm(workspace.root, { recursive: true, force: true })
}

async function sameContent(a: string, b: string): Promise<boolean> {
  if (!(await fileExists(a))) return false
  const [left, right] = await Promise.all([readFile(a), readFile(b)])
  return left.equals(right)
}

/**
 * Copy every requested output from the workspace to its final location,
 * leaving files whose content is already identical untouched.
 * Returns the paths that were written.
 */
export async function publishOutputs(workspace: Workspace, targets: PublishTargets): Promise<string[]> {
  const pairs: [string, string][] = []
  for (const key of PUBLISHED_KEYS) {
    const finalPath = targets[key]
    if (!finalPath) continue
    const source = workspace.artifacts[key]
    if (!(await fileExists(source))) {
      throw new PipelineError('MissingResource', `Expected output ${key} was not produced at ${source}`)
    }
    pairs.push([source, finalPath])
  }

  const written: string[] = []
  for (const [source, finalPath] of pairs) {
    if (await sameContent(finalPath, source)) continue
    await mkdir(dirname(finalPath), { recursive: true })
    await copyFile(source, finalPath)
    written.push(finalPath)
  }
  return written
}
