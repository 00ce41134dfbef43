#!/usr/bin/env node
import { Command } from 'commander'
import { compileCommand, type CompileOptions } from './commands/compile.js'
import { ledgerMergeCommand, ledgerResolveCommand } from './commands/ledger.js'

const program = new Command()

program
  .name('respack')
  .description('Merge, normalize and link per-module resource directories')
  .version('0.1.0')

program
  .command('compile')
  .description('Merge dependency resources and link them into one resource archive')
  .option('--config <path>', 'Configuration file', 'respack.yaml')
  .option('--debug-dir <dir>', 'Keep the workspace under this directory')
  .option('--strict-manifest', 'Fail when the manifest does not match its expectation file')
  .option('--json', 'Output the run report as JSON')
  .action(async (options: CompileOptions) => {
    const result = await compileCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

const ledger = program
  .command('ledger')
  .description('Inspect and combine rename ledgers')

ledger
  .command('merge <output> <inputs...>')
  .description('Merge rename ledgers into one sorted ledger')
  .action(async (output: string, inputs: string[]) => {
    const result = await ledgerMergeCommand(output, inputs)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

ledger
  .command('resolve <ledger> <path>')
  .description('Print the original dependency path of a packaged resource path')
  .action(async (ledgerPath: string, path: string) => {
    const result = await ledgerResolveCommand(ledgerPath, path)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

await program.parseAsync()
