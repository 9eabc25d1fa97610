// Config library for intra-cli
//
// Storage location:
// - $XDG_CONFIG_HOME/intra-cli/config.toml (default ~/.config/intra-cli/config.toml) - OAuth app credentials (0o600)

// Types
export { appConfigSchema, MAX_CLIENT_FIELD_LENGTH } from './types'
export type { AppConfig, ConfigCheck } from './types'

// Paths
export {
  APP_NAME,
  CONFIG_FILENAME,
  DEFAULT_API_URL,
  OAUTH_APPLICATIONS_URL,
  OAUTH_REDIRECT_URL,
  getApiUrl,
  getConfigDir,
  getConfigPath,
} from './paths'

// TOML utilities
export { escapeTomlString, formatTomlLine, generateTOML } from './toml'
export type { TomlField } from './toml'

// Store
export { ConfigStore } from './store'

// Prompts for first-run configuration
export { createStdinPrompter } from './prompts'
export type { Prompter } from './prompts'
