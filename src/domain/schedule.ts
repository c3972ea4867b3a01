/**
 * Schedule computation for the daemon (local time)
 */

import { WEEKDAYS, type ScheduleSpec, type TimeOfDay, type Weekday } from '../types.js'

// Date#getDay() numbering starts on Sunday
const DAY_BY_INDEX: Weekday[] = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday'
]

export function weekdayOf(date: Date): Weekday {
  return DAY_BY_INDEX[date.getDay()]
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${pad(time.hour)}:${pad(time.minute)}`
}

/**
 * `YYYY-MM-DD HH:MM`
 */
export function formatRunTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}`
}

/**
 * First scheduled time strictly after `from`, or undefined when the
 * schedule has no days or no times.
 *
 * Looks at today and the following seven days, which covers a schedule
 * with a single weekday whose time today has already passed.
 */
export function nextRunTime(spec: ScheduleSpec, from: Date): Date | undefined {
  if (spec.days.length === 0 || spec.times.length === 0) {
    return undefined
  }

  const times = [...spec.times].sort((a, b) => a.hour - b.hour || a.minute - b.minute)

  for (let offset = 0; offset <= 7; offset++) {
    const day = new Date(from.getFullYear(), from.getMonth(), from.getDate() + offset)
    if (!spec.days.includes(weekdayOf(day))) continue

    for (const time of times) {
      const candidate = new Date(day.getFullYear(), day.getMonth(), day.getDate(), time.hour, time.minute, 0, 0)
      if (candidate.getTime() > from.getTime()) {
        return candidate
      }
    }
  }

  return undefined
}

export function describeSchedule(spec: ScheduleSpec): string[] {
  const days = spec.days.length === WEEKDAYS.length
    ? 'every day'
    : spec.days.map(day => day.charAt(0).toUpperCase() + day.slice(1)).join(', ')
  return [
    `Update days: ${days}`,
    `Update times: ${spec.times.map(formatTimeOfDay).join(', ')}`,
    `Watch configuration files: ${spec.watchConfig ? 'yes' : 'no'}`
  ]
}
