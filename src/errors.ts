/**
 * Error types surfaced to the top-level handler in index.ts.
 * Nothing below is retried; each class names the step that failed.
 */

export type ConfigErrorKind = 'missing' | 'invalid' | 'filesystem'

export class ConfigError extends Error {
  constructor(
    message: string,
    public kind: ConfigErrorKind,
    public path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

/**
 * Authentication or transport failure from the session.
 * status is 0 when no HTTP response was received (network error, timeout).
 */
export class SessionError extends Error {
  constructor(
    message: string,
    public status: number,
    public body?: unknown
  ) {
    super(message)
    this.name = 'SessionError'
  }
}

export class UrlConstructionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'UrlConstructionError'
  }
}

export class DeserializationError extends Error {
  constructor(
    message: string,
    public resource: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'DeserializationError'
  }
}

export class TimestampParseError extends Error {
  constructor(public value: string) {
    super(value ? `Invalid timestamp: "${value}"` : 'Missing timestamp')
    this.name = 'TimestampParseError'
  }
}

export class UserNotFoundError extends Error {
  constructor(public login: string) {
    super(`No user found with login "${login}"`)
    this.name = 'UserNotFoundError'
  }
}

export class CursusNotFoundError extends Error {
  constructor(public cursus: string) {
    super(`No "${cursus}" cursus enrollment found on this profile`)
    this.name = 'CursusNotFoundError'
  }
}

export class UnknownCommandError extends Error {
  constructor(
    public input: string,
    public validCommands: readonly string[]
  ) {
    super(`Unknown command "${input}". Valid commands: ${validCommands.join(', ')}`)
    this.name = 'UnknownCommandError'
  }
}
