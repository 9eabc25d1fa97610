import { z } from 'zod'

export const MAX_CLIENT_FIELD_LENGTH = 256

// client_id and client_secret: non-empty, at most 256 characters
const clientFieldSchema = z.string().min(1).max(MAX_CLIENT_FIELD_LENGTH)

/**
 * User config - OAuth application credentials and the intra login to look up
 * Stored in ~/.config/intra-cli/config.toml (0o600)
 */
export const appConfigSchema = z.object({
  client_id: clientFieldSchema,
  client_secret: clientFieldSchema,
  login: z.string(),
  cursus: z.string().optional(),
})
export type AppConfig = z.infer<typeof appConfigSchema>

export type ConfigCheck =
  | { ok: true; config: AppConfig }
  | { ok: false; kind: 'missing' | 'invalid'; reason: string }
