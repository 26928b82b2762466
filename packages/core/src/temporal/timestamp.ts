import { Option, Schema } from "effect"

/**
 * Timestamps are wall-clock values: a `Date` whose UTC fields carry the local
 * day and time as printed in the source (no zone conversion is applied).
 */

const TIMESTAMP_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2})$/
const ABSOLUTE_PREFIX = /^\s*\d{1,2}\/\d{1,2}\/\d{4}\b/
const ISO_WALL_CLOCK = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?/

/** `DD/MM/YYYY HH:MM:SS` */
export const Timestamp = Schema.String.pipe(Schema.pattern(TIMESTAMP_PATTERN))
export type Timestamp = typeof Timestamp.Type

export const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate()

/** `Some` for a real date in years 1 to 9999, which `DD/MM/YYYY` can print. */
export const validDate = (date: Date): Option.Option<Date> => {
  const year = date.getUTCFullYear()
  return Number.isNaN(date.getTime()) || year < 1 || year > 9999 ? Option.none() : Option.some(date)
}

export const makeTimestamp = (
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): Option.Option<Date> => {
  if (month < 1 || month > 12) return Option.none()
  if (day < 1 || day > daysInMonth(year, month)) return Option.none()
  if (hour > 23 || minute > 59 || second > 59) return Option.none()
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second))
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(year)
  return validDate(date)
}

const pad = (n: number): string => String(n).padStart(2, "0")

export const formatTimestamp = (date: Date): string =>
  `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${date.getUTCFullYear()} ` +
  `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`

export const parseTimestamp = (value: string): Option.Option<Date> => {
  const match = value.trim().match(TIMESTAMP_PATTERN)
  if (!match) return Option.none()
  const [, day, month, year, hour, minute, second] = match.map(Number)
  return makeTimestamp(year ?? 0, month ?? 0, day ?? 0, hour, minute, second)
}

const DAY_ONLY = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/

/** `DD/MM/YYYY` (midnight) or a full timestamp. */
export const parseDayOrTimestamp = (value: string): Option.Option<Date> => {
  const text = value.trim()
  const day = text.match(DAY_ONLY)
  return day ? makeTimestamp(Number(day[3]), Number(day[2]), Number(day[1])) : parseTimestamp(text)
}

/** True for strings that claim to be an absolute `DD/MM/YYYY ...` value. */
export const looksAbsolute = (value: string): boolean => ABSOLUTE_PREFIX.test(value)

/**
 * Reads the wall-clock part of an ISO-8601 value such as
 * `2025-08-09T19:00:00+0000`; the offset is ignored.
 */
export const fromIsoWallClock = (iso: string): Option.Option<Date> => {
  const match = iso.trim().match(ISO_WALL_CLOCK)
  if (!match) return Option.none()
  const [, year, month, day, hour, minute, second] = match.map((part) => (part === undefined ? 0 : Number(part)))
  return makeTimestamp(year ?? 0, month ?? 0, day ?? 0, hour, minute, second)
}

export const isWeekend = (date: Date): boolean => {
  const weekday = date.getUTCDay()
  return weekday === 0 || weekday === 6
}
