import { UnknownCommandError } from '../errors'

export const COMMANDS = ['id', 'me', 'email', 'login', 'correction-point', 'wallet', 'blackhole'] as const
export type Command = (typeof COMMANDS)[number]

export const DEFAULT_COMMAND: Command = 'login'

// Alternate spellings accepted on the command line
const ALIASES: Record<string, Command> = {
  correction_point: 'correction-point',
}

export function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value)
}

/**
 * Map a command-line token to a Command. Matching ignores case and
 * surrounding whitespace; anything else is an error, never a fallback.
 */
export function parseCommand(input: string): Command {
  const token = input.trim().toLowerCase()
  if (isCommand(token)) {
    return token
  }
  const alias = ALIASES[token]
  if (alias) {
    return alias
  }
  throw new UnknownCommandError(input, COMMANDS)
}
