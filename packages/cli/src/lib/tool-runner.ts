import { execFile } from 'node:child_process'
import { PipelineError } from 'shared'

export interface ToolOutput {
  stdout: string
  stderr: string
}

export interface ToolRunOptions {
  /** stderr lines matching this are informational and left out of diagnostics. */
  stderrFilter?: RegExp
  /** Echo remaining stderr on success. */
  printStderr?: boolean
}

/**
 * Runs one external command given as argv. Rejects with an
 * `ExternalToolFailure` when the command cannot start or exits non-zero.
 */
export type ToolRunner = (command: string[], options?: ToolRunOptions) => Promise<ToolOutput>

export function filterLines(text: string, pattern?: RegExp): string {
  if (!pattern) return text
  return text
    .split('\n')
    .filter(line => !pattern.test(line))
    .join('\n')
}

export const runTool: ToolRunner = (command, options = {}) => {
  const [file, ...args] = command
  return new Promise((resolve, reject) => {
    execFile(file, args, { encoding: 'utf-8', maxBuffer: 64 * 1024 * 1024 }, (error, stdout, stderr) => {
      const diagnostics = filterLines(stderr, options.stderrFilter).trim()
      if (error) {
        const status = typeof error.code === 'number' ? `exit code ${error.code}` : String(error.code ?? error.message)
        reject(new PipelineError(
          'ExternalToolFailure',
          `Command failed (${status}): ${command.join(' ')}${diagnostics ? `\n${diagnostics}` : ''}`,
        ))
        return
      }
      if (options.printStderr && diagnostics) {
        console.error(diagnostics)
      }
      resolve({ stdout, stderr: diagnostics })
    })
  })
}
