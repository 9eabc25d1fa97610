import { chmod, mkdir, readFile, stat, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { parse as parseToml } from 'smol-toml'
import { ConfigError } from '../errors'
import log from '../logger'
import { CONFIG_FILENAME, OAUTH_APPLICATIONS_URL, OAUTH_REDIRECT_URL, getConfigPath } from './paths'
import type { Prompter } from './prompts'
import { generateTOML } from './toml'
import { appConfigSchema, type AppConfig, type ConfigCheck } from './types'

const CONFIG_HEADER = [
  '# intra-cli configuration',
  '#',
  '# Delete this file and run `intra` again to reconfigure.',
]

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Owns the per-user config file: existence check, first-run capture,
 * validation and loading.
 */
export class ConfigStore {
  readonly path: string

  constructor(path: string = getConfigPath()) {
    this.path = path
  }

  /**
   * True iff the config file is present. A missing config directory
   * counts as "does not exist".
   */
  async exists(): Promise<boolean> {
    try {
      const info = await stat(this.path)
      return info.isFile()
    } catch (err) {
      log.debug(`No config at ${this.path} (${errorCode(err) ?? errorMessage(err)})`)
      return false
    }
  }

  /**
   * Print OAuth application setup instructions, ask for the three values and
   * write them to a new config file.
   */
  async createInteractive(prompter: Prompter): Promise<void> {
    prompter.say(`Browse to: ${OAUTH_APPLICATIONS_URL}`)
    prompter.say('Create new Application')
    prompter.say(`Set redirect_url to "${OAUTH_REDIRECT_URL}"`)

    let clientId: string
    let clientSecret: string
    let login: string
    try {
      clientId = (await prompter.ask('Enter client id:')).trim()
      clientSecret = (await prompter.ask('Enter client secret:')).trim()
      login = (await prompter.ask('Enter intra login:')).trim()
    } finally {
      prompter.close()
    }

    await this.write({ client_id: clientId, client_secret: clientSecret, login })
  }

  /**
   * Write config with owner-only permissions, creating the directory if needed.
   */
  async write(config: AppConfig): Promise<void> {
    const fields = [
      { key: 'client_id', value: config.client_id },
      { key: 'client_secret', value: config.client_secret },
      { key: 'login', value: config.login },
    ]
    if (config.cursus !== undefined) {
      fields.push({ key: 'cursus', value: config.cursus })
    }

    try {
      await mkdir(dirname(this.path), { recursive: true })
    } catch (err) {
      throw new ConfigError(
        `Could not create config directory ${dirname(this.path)}: ${errorMessage(err)}`,
        'filesystem',
        this.path,
        { cause: err }
      )
    }

    try {
      await writeFile(this.path, generateTOML(fields, CONFIG_HEADER), { mode: 0o600 })
      // Set permissions explicitly in case the file already existed with different permissions
      await chmod(this.path, 0o600)
    } catch (err) {
      throw new ConfigError(
        `Could not write ${this.path}: ${errorMessage(err)}`,
        'filesystem',
        this.path,
        { cause: err }
      )
    }
    log.debug(`Wrote ${this.path}`)
  }

  /**
   * Read, parse and validate the config file.
   * Unreadable, malformed or out-of-range configs come back as { ok: false }
   * after a diagnostic; any other read failure throws.
   */
  async check(): Promise<ConfigCheck> {
    let content: string
    try {
      content = await readFile(this.path, 'utf-8')
    } catch (err) {
      const code = errorCode(err)
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        log.error(`${CONFIG_FILENAME} not found`)
        return { ok: false, kind: 'missing', reason: `${this.path} not found` }
      }
      if (code === 'EACCES' || code === 'EPERM') {
        log.error(`${CONFIG_FILENAME} not readable`)
        return { ok: false, kind: 'invalid', reason: `${this.path} is not readable` }
      }
      throw new ConfigError(
        `Could not read ${this.path}: ${errorMessage(err)}`,
        'filesystem',
        this.path,
        { cause: err }
      )
    }

    let parsed: unknown
    try {
      parsed = parseToml(content)
    } catch (err) {
      log.error(`${CONFIG_FILENAME} is not valid TOML`)
      return { ok: false, kind: 'invalid', reason: `${this.path} is not valid TOML: ${errorMessage(err)}` }
    }

    const result = appConfigSchema.safeParse(parsed)
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
      log.error(`${CONFIG_FILENAME} is invalid`)
      return { ok: false, kind: 'invalid', reason: `${this.path} is invalid (${issues})` }
    }

    return { ok: true, config: result.data }
  }

  async validate(): Promise<boolean> {
    const result = await this.check()
    return result.ok
  }

  async load(): Promise<AppConfig> {
    const result = await this.check()
    if (!result.ok) {
      const hint = result.kind === 'missing'
        ? 'Run `intra` again to create it.'
        : 'Delete it and run `intra` again to reconfigure.'
      throw new ConfigError(
        `${result.reason}. ${hint}`,
        result.kind,
        this.path
      )
    }
    return result.config
  }
}
