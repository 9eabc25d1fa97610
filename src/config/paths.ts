import { homedir } from 'os'
import { join } from 'path'

export const APP_NAME = 'intra-cli'
export const CONFIG_FILENAME = 'config.toml'

export const DEFAULT_API_URL = 'https://api.intra.42.fr'
export const OAUTH_APPLICATIONS_URL = 'https://profile.intra.42.fr/oauth/applications/new'
export const OAUTH_REDIRECT_URL = 'http://localhost:8080'

/**
 * Per-user config directory. XDG_CONFIG_HOME wins when set, otherwise
 * ~/.config/intra-cli on every platform.
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME
  const base = xdg && xdg.trim() ? xdg : join(homedir(), '.config')
  return join(base, APP_NAME)
}

export function getConfigPath(): string {
  return join(getConfigDir(), CONFIG_FILENAME)
}

/**
 * Get the API base URL from environment variable or return default.
 */
export function getApiUrl(): string {
  // Environment variable takes precedence
  if (process.env.INTRA_API_URL) {
    return process.env.INTRA_API_URL.replace(/\/+$/, '')
  }

  return DEFAULT_API_URL
}
