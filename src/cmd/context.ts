import { Session, type AuthenticatedSession } from '../api/session'
import { ApiUserResolver, type UserResolver } from '../api/users'
import { ConfigStore, createStdinPrompter, getApiUrl, type AppConfig, type Prompter } from '../config'
import log from '../logger'
import { parseCommand } from './commands'
import { DEFAULT_CURSUS, dispatch, type Printer } from './render'

export type SessionFactory = (config: AppConfig, apiUrl: string) => Promise<AuthenticatedSession>
export type ResolverFactory = (session: AuthenticatedSession, apiUrl: string) => UserResolver

export interface IntraContextOptions {
  /** Config file location, defaults to the per-user config path */
  store?: ConfigStore
  /** Source of answers for first-run setup, defaults to stdin */
  prompter?: Prompter
  /** API base URL override */
  apiUrl?: string
  createSession?: SessionFactory
  createResolver?: ResolverFactory
  print?: Printer
  now?: () => Date
}

const defaultSessionFactory: SessionFactory = (config, apiUrl) => Session.create(config, { apiUrl })

const defaultResolverFactory: ResolverFactory = (session, apiUrl) => new ApiUserResolver(session, apiUrl)

/**
 * IntraContext ties one invocation together: make sure a valid config
 * exists, open the session, then resolve the user and run a command.
 *
 * Setup order:
 * 1. Missing config file - run interactive setup once
 * 2. Validate config - any failure stops here
 * 3. Create the session (token exchange)
 */
export class IntraContext {
  private constructor(
    readonly config: AppConfig,
    readonly session: AuthenticatedSession,
    private readonly resolver: UserResolver,
    private readonly print: Printer,
    private readonly now: () => Date
  ) {}

  static async create(options: IntraContextOptions = {}): Promise<IntraContext> {
    const store = options.store ?? new ConfigStore()
    const apiUrl = options.apiUrl ?? getApiUrl()

    if (!(await store.exists())) {
      log.debug(`No config found at ${store.path}, starting setup`)
      await store.createInteractive(options.prompter ?? createStdinPrompter())
    }

    const config = await store.load()

    const session = await (options.createSession ?? defaultSessionFactory)(config, apiUrl)
    const resolver = (options.createResolver ?? defaultResolverFactory)(session, apiUrl)

    return new IntraContext(
      config,
      session,
      resolver,
      options.print ?? ((line) => console.log(line)),
      options.now ?? (() => new Date())
    )
  }

  /**
   * Run a command given as typed on the command line.
   * Unknown commands fail before any request is made.
   */
  async run(input: string): Promise<void> {
    const command = parseCommand(input)
    const user = await this.resolver.resolve()
    dispatch(command, user, {
      print: this.print,
      now: this.now(),
      cursus: this.config.cursus ?? DEFAULT_CURSUS,
    })
  }
}
