/**
 * Date parsing into ISO calendar dates (YYYY-MM-DD).
 */

import { format, isValid, parse } from 'date-fns'

const ACCEPTED_FORMATS = [
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'M/d/yyyy',
  'MM/dd/yyyy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
] as const

const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/

const MIN_YEAR = 1990
const MAX_YEAR = 2100

// All accepted formats carry a full date; this only satisfies parse()
const REFERENCE_DATE = new Date(2000, 0, 1)

function isPlausible(date: Date): boolean {
  const year = date.getFullYear()
  return isValid(date) && year >= MIN_YEAR && year <= MAX_YEAR
}

/**
 * Parse a date string in any accepted format.
 *
 * @returns YYYY-MM-DD, or null when unparseable or implausible
 */
export function parseIsoDate(raw: string): string | null {
  const value = raw.trim()
  if (!value) {
    return null
  }

  const dateTime = ISO_DATE_TIME.exec(value)
  const candidate = dateTime ? dateTime[1] : value

  for (const pattern of ACCEPTED_FORMATS) {
    const parsed = parse(candidate, pattern, REFERENCE_DATE)
    if (isPlausible(parsed)) {
      return format(parsed, 'yyyy-MM-dd')
    }
  }

  return null
}

/**
 * Calendar day of a timestamp, in the same YYYY-MM-DD form.
 */
export function calendarDay(date: Date): string {
  return format(date, 'yyyy-MM-dd')
}
