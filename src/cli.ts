import { Command } from 'commander'
import { COMMANDS, DEFAULT_COMMAND, parseCommand } from './cmd/commands'
import { IntraContext } from './cmd/context'
import log, { setLogLevel, setShowStackTraces, shouldShowStackTraces } from './logger'
import { DESCRIPTION, VERSION } from './version'

export type CommandRunner = (command: string) => Promise<void>

const defaultRunner: CommandRunner = async (command) => {
  // Reject unknown commands before setup or the token exchange
  parseCommand(command)
  const ctx = await IntraContext.create()
  await ctx.run(command)
}

/**
 * Wrap an action so any error is printed and the process exits with status 1.
 */
export function withErrorHandling<A extends unknown[]>(
  name: string,
  handler: (...args: A) => Promise<void>,
  exit: (code: number) => void = (code) => process.exit(code)
) {
  return async (...args: A): Promise<void> => {
    try {
      await handler(...args)
    } catch (error) {
      // By default, just show the error message cleanly
      // With --show-stack, show the full error with stack trace
      if (shouldShowStackTraces()) {
        log.error(`${name} failed:`, error)
      } else {
        const message = error instanceof Error ? error.message : String(error)
        log.error(`${name} failed: ${message}`)
      }
      exit(1)
    }
  }
}

export function createProgram(run: CommandRunner = defaultRunner): Command {
  const program = new Command()

  program
    .name('intra')
    .description(DESCRIPTION)
    .version(VERSION)
    .argument('[command]', `Command to run: ${COMMANDS.join(', ')}`, DEFAULT_COMMAND)
    .option('-v, --verbose', 'Verbose output (logs API requests)')
    .option('-q, --quiet', 'Quiet mode (errors only)')
    .option('--show-stack', 'Show full error stack traces')
    .action(
      withErrorHandling('intra', async (command: string) => {
        await run(command)
      })
    )

  program.hook('preAction', () => {
    const opts = program.opts<{ verbose?: boolean; quiet?: boolean; showStack?: boolean }>()
    if (opts.verbose) {
      setLogLevel('verbose')
    } else if (opts.quiet) {
      setLogLevel('quiet')
    }
    if (opts.showStack) {
      setShowStackTraces(true)
    }
  })

  return program
}
