/**
 * Profile field renderers. Each prints one `label value` line with the
 * label padded to LABEL_WIDTH; `me` composes the others.
 */

import type { ResolvedUser } from '../api/users'
import type { CursusUser, UserProfile } from '../api/types'
import { CursusNotFoundError, TimestampParseError } from '../errors'
import type { Command } from './commands'

export type Printer = (line: string) => void

export interface RenderContext {
  print: Printer
  now: Date
  /** Name of the cursus `me` and `blackhole` report on */
  cursus: string
}

export type Renderer = (user: ResolvedUser, ctx: RenderContext) => void

export const LABEL_WIDTH = 20
export const DEFAULT_CURSUS = '42cursus'

// Position of the main cursus in cursus_users when no name matches
const FALLBACK_CURSUS_INDEX = 1

const MS_PER_DAY = 24 * 60 * 60 * 1000

// RFC 3339 date-time, as returned by the API (e.g. 2024-05-01T09:42:00.000Z)
const RFC3339 = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-](\d{2}):(\d{2}))$/i

export function formatField(label: string, value: string | number): string {
  return `${label.padEnd(LABEL_WIDTH)}${value}`
}

/**
 * True when the fields name a real calendar date and wall-clock time.
 * Date.parse would roll 2024-02-30 or 24:00 over into the next day.
 */
function isCalendarValid(match: RegExpExecArray): boolean {
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number)
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return false
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second))
  const offsetHours = Number(match[9] ?? 0)
  const offsetMinutes = Number(match[10] ?? 0)
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second &&
    offsetHours <= 23 &&
    offsetMinutes <= 59
  )
}

export function parseTimestamp(value: string | null | undefined): Date {
  const raw = value ?? ''
  const match = RFC3339.exec(raw)
  const time = match && isCalendarValid(match) ? Date.parse(raw) : NaN
  if (Number.isNaN(time)) {
    throw new TimestampParseError(raw)
  }
  return new Date(time)
}

/**
 * Whole days from `now` until `target`, truncated toward zero.
 * Negative once the target has passed.
 */
export function daysBetween(now: Date, target: Date): number {
  const days = Math.trunc((target.getTime() - now.getTime()) / MS_PER_DAY)
  return days === 0 ? 0 : days
}

/**
 * Pick the enrollment to report on: the cursus named `name`, else the one at
 * FALLBACK_CURSUS_INDEX.
 */
export function selectCursus(profile: UserProfile, name: string): CursusUser {
  const byName = profile.cursus_users.find((entry) => entry.cursus.name === name)
  const enrollment = byName ?? profile.cursus_users[FALLBACK_CURSUS_INDEX]
  if (!enrollment) {
    throw new CursusNotFoundError(name)
  }
  return enrollment
}

export function firstTitleWord(profile: UserProfile): string {
  const [title] = profile.titles
  return title ? title.name.split(' ')[0] ?? '' : ''
}

export const renderId: Renderer = ({ summary }, { print }) => {
  print(formatField('ID', summary.id))
}

export const renderLogin: Renderer = ({ profile }, { print }) => {
  print(formatField('Login', profile.login))
}

export const renderEmail: Renderer = ({ profile }, { print }) => {
  print(formatField('Email', profile.email))
}

export const renderWallet: Renderer = ({ profile }, { print }) => {
  print(formatField('Wallet', profile.wallet))
}

export const renderCorrectionPoint: Renderer = ({ profile }, { print }) => {
  print(formatField('Correction point', profile.correction_point))
}

export const renderBlackhole: Renderer = ({ profile }, { print, now, cursus }) => {
  const enrollment = selectCursus(profile, cursus)
  const blackholedAt = parseTimestamp(enrollment.blackholed_at)
  print(formatField('Blackhole', daysBetween(now, blackholedAt)))
}

export const renderMe: Renderer = (user, ctx) => {
  const { profile } = user
  ctx.print(`${profile.displayname} | ${firstTitleWord(profile)} ${profile.login}`)
  renderWallet(user, ctx)
  renderCorrectionPoint(user, ctx)

  const enrollment = selectCursus(profile, ctx.cursus)
  ctx.print(formatField('Cursus', enrollment.cursus.name))
  ctx.print(formatField('Grade', enrollment.grade ?? ''))
  renderBlackhole(user, ctx)
}

const RENDERERS: Record<Command, Renderer> = {
  id: renderId,
  me: renderMe,
  email: renderEmail,
  login: renderLogin,
  'correction-point': renderCorrectionPoint,
  wallet: renderWallet,
  blackhole: renderBlackhole,
}

export function dispatch(command: Command, user: ResolvedUser, ctx: RenderContext): void {
  RENDERERS[command](user, ctx)
}
