#!/usr/bin/env node
import '../env.js'
import { runCheckCommand } from './commands/check.js'
import { runCollectCommand } from './commands/collect.js'
import { asPositiveInt, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Shelfwatch collector')
  console.log('')
  console.log('Commands:')
  console.log('  collect [--config <path>] [--out <dir>] [--competitor <id>] [--timeout-minutes <n>] [--dry-run]')
  console.log('  check')
}

async function main(): Promise<void> {
  const [, , first, ...others] = process.argv
  // `collect` is the default command
  const command = !first || first.startsWith('--') ? 'collect' : first
  const rest = first?.startsWith('--') ? [first, ...others] : others

  const flags = parseFlags(rest)
  if (command === 'help' || command === '-h' || flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'collect': {
      const timeoutMinutes = asPositiveInt(flags['timeout-minutes'])
      if (flags['timeout-minutes'] !== undefined && timeoutMinutes === undefined) {
        console.error('--timeout-minutes must be a positive integer')
        process.exit(2)
      }
      exitCode = await runCollectCommand({
        configPath: asString(flags.config),
        outDir: asString(flags.out),
        competitorId: asString(flags.competitor),
        timeoutMinutes,
        dryRun: flags['dry-run'] === true,
      })
      break
    }
    case 'check':
      exitCode = await runCheckCommand()
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
