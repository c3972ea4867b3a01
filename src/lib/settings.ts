/**
 * The `declarr` section of the configuration file
 *
 * ```yaml
 * declarr:
 *   watch_config: true
 *   update_days: [monday, thursday]
 *   update_times: ["03:00", "15:30"]
 *   request_timeout: 30
 *   concurrency: 2
 * ```
 */

import { z } from 'zod'
import { WEEKDAYS, type ScheduleSpec, type TimeOfDay, type Weekday } from '../types.js'
import { InvalidConfigError } from './errors.js'

export const SETTINGS_SECTION = 'declarr'

const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/

/**
 * Parse `HH:MM` (24-hour clock)
 */
export function parseTimeOfDay(input: string): TimeOfDay | undefined {
  const match = TIME_PATTERN.exec(input.trim())
  if (!match) return undefined
  return { hour: Number(match[1]), minute: Number(match[2]) }
}

export function parseWeekday(input: string): Weekday | undefined {
  const normalized = input.trim().toLowerCase()
  return WEEKDAYS.find(day => day === normalized)
}

export const weekdaySchema = z.string().transform((input, ctx) => {
  const day = parseWeekday(input)
  if (!day) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid weekday "${input}" (expected one of: ${WEEKDAYS.join(', ')})`
    })
    return z.NEVER
  }
  return day
})

export const timeOfDaySchema = z.string().transform((input, ctx) => {
  const time = parseTimeOfDay(input)
  if (!time) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid time "${input}" (expected HH:MM)`
    })
    return z.NEVER
  }
  return time
})

export const settingsSchema = z.object({
  watch_config: z.boolean().default(false),
  update_days: z.array(weekdaySchema).min(1).default([...WEEKDAYS]),
  update_times: z.array(timeOfDaySchema).min(1).default(['03:00']),
  /** Seconds */
  request_timeout: z.number().positive().default(30),
  concurrency: z.number().int().min(1).default(1)
}).strict()

export type DeclarrSettings = z.infer<typeof settingsSchema>

/**
 * Validate the `declarr` section (absent means all defaults)
 */
export function parseSettings(raw: unknown): DeclarrSettings {
  const result = settingsSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw InvalidConfigError.fromZodIssues(SETTINGS_SECTION, result.error.issues)
  }
  return result.data
}

/**
 * Overrides given on the command line take precedence over the file
 */
export interface ScheduleOverrides {
  watchConfig?: boolean
  updateDays?: Weekday[]
  updateTimes?: TimeOfDay[]
}

export function toScheduleSpec(settings: DeclarrSettings, overrides: ScheduleOverrides = {}): ScheduleSpec {
  const days = overrides.updateDays && overrides.updateDays.length > 0
    ? overrides.updateDays
    : settings.update_days
  const times = overrides.updateTimes && overrides.updateTimes.length > 0
    ? overrides.updateTimes
    : settings.update_times

  return {
    days: WEEKDAYS.filter(day => days.includes(day)),
    times: [...times].sort((a, b) => a.hour - b.hour || a.minute - b.minute),
    watchConfig: overrides.watchConfig ?? settings.watch_config
  }
}
