import { z } from 'zod'
import { DeserializationError } from '../errors'

// API response schemas
// Only the fields the CLI reads are declared; anything else the API sends is ignored.

// OAuth token (POST /oauth/token, client_credentials grant)
export const tokenInfoSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
  created_at: z.number().optional(),
})
export type TokenInfo = z.infer<typeof tokenInfoSchema>

// Element of GET /v2/users?filter[login]=...
export const userSummarySchema = z
  .object({
    id: z.number().int(),
    login: z.string(),
  })
  .passthrough()
export type UserSummary = z.infer<typeof userSummarySchema>

export const userSummaryListSchema = z.array(userSummarySchema)

export const titleSchema = z.object({
  name: z.string(),
})
export type Title = z.infer<typeof titleSchema>

export const cursusUserSchema = z.object({
  grade: z.string().nullish(),
  blackholed_at: z.string().nullish(),
  cursus: z.object({
    name: z.string(),
  }),
})
export type CursusUser = z.infer<typeof cursusUserSchema>

// GET /v2/users/:id
export const userProfileSchema = z.object({
  displayname: z.string(),
  login: z.string(),
  email: z.string(),
  wallet: z.number().int(),
  correction_point: z.number().int(),
  titles: z.array(titleSchema),
  cursus_users: z.array(cursusUserSchema),
})
export type UserProfile = z.infer<typeof userProfileSchema>

/**
 * Parse a JSON response body against a schema.
 * Invalid JSON and shape mismatches both raise DeserializationError.
 */
export function decodeJson<S extends z.ZodTypeAny>(text: string, schema: S, resource: string): z.infer<S> {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (err) {
    throw new DeserializationError(`${resource}: response is not valid JSON`, resource, { cause: err })
  }

  const result = schema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new DeserializationError(`${resource}: unexpected response (${issues})`, resource, {
      cause: result.error,
    })
  }
  return result.data
}
