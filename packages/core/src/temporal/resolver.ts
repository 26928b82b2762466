import { Option } from "effect"
import vocabulary from "../../data/temporal-vocabulary.json" with { type: "json" }
import { daysInMonth, formatTimestamp, makeTimestamp, validDate } from "./timestamp.js"

type Unit = "minute" | "hour" | "day" | "week" | "month" | "year"

const UNITS: ReadonlySet<string> = new Set(["minute", "hour", "day", "week", "month", "year"])
const isUnit = (value: string): value is Unit => UNITS.has(value)

const MONTHS: ReadonlyMap<string, number> = new Map(Object.entries(vocabulary.months))
const NUMBERS: ReadonlyMap<string, number> = new Map(Object.entries(vocabulary.numbers))
const UNIT_WORDS: ReadonlyMap<string, Unit> = new Map(
  Object.entries(vocabulary.units).flatMap(([word, unit]) => (isUnit(unit) ? [[word, unit] as const] : []))
)

const MONTH_NAMES = [...MONTHS.keys()].join("|")
const UNIT_NAMES = [...UNIT_WORDS.keys()].sort((a, b) => b.length - a.length).join("|")

const SLASH_DATE = /\b(\d{1,2})\/(\d{1,2})(?:\/(\d{4}|\d{2}))?\b/
const DASH_DATE = /\b(\d{1,2})-(\d{1,2})(?:-(\d{4}|\d{2}))?\b/
const SPANISH_DATE = new RegExp(`\\b(\\d{1,2})\\s+de\\s+(${MONTH_NAMES})\\b(?:\\s+(?:de|del)\\s+(\\d{4}))?`)
const ENGLISH_DAY_MONTH = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?(${MONTH_NAMES})\\b(?:,?\\s+(\\d{4}))?`)
const ENGLISH_MONTH_DAY = new RegExp(`\\b(${MONTH_NAMES})\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b(?:,?\\s+(\\d{4}))?`)
const TIME_OF_DAY = /\b(\d{1,2}):(\d{2})(?::(\d{2}))?\b/

const QUALIFIER = "(?:(?:casi|aproximadamente|aprox|unos|unas|alrededor de|mas o menos|almost|nearly|about|around|roughly|approximately)\\s+)?"
const SPANISH_AGO = new RegExp(`\\bhace\\s+${QUALIFIER}(\\d+|[a-z]+)\\s+(${UNIT_NAMES})\\b`)
const ENGLISH_AGO = new RegExp(`\\b${QUALIFIER}(\\d+|[a-z]+)\\s+(${UNIT_NAMES})\\s+ago\\b`)

const TWO_DAYS_BACK = /\b(?:anteayer|antier|antes de ayer|day before yesterday)\b/
const ONE_DAY_BACK = /\b(?:ayer|anoche|yesterday|last night)\b/
const SAME_DAY = /\b(?:hoy|today|tonight|esta manana|esta tarde|esta noche|this morning|this afternoon)\b/

const MINUTE_MS = 60_000
const DAY_MS = 86_400_000

export interface ResolveOptions {
  /**
   * Subtract months and years on the calendar (same day of month, clamped to
   * the target month's last day). When false, a month is 30 days and a year 365.
   */
  readonly calendar?: boolean
}

const simplify = (phrase: string): string =>
  phrase
    .normalize("NFD")
    .replace(/\p{M}+/gu, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim()

const expandYear = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined) return fallback
  const year = Number(raw)
  return raw.length === 2 ? 2000 + year : year
}

const withTimeOfDay = (reference: Date, text: string, year: number, month: number, day: number) => {
  const time = text.match(TIME_OF_DAY)
  return time
    ? makeTimestamp(year, month, day, Number(time[1]), Number(time[2]), Number(time[3] ?? 0))
    : makeTimestamp(year, month, day, reference.getUTCHours(), reference.getUTCMinutes(), reference.getUTCSeconds())
}

const absoluteDate = (reference: Date, text: string): Option.Option<Date> => {
  const year = reference.getUTCFullYear()

  const slash = text.match(SLASH_DATE) ?? text.match(DASH_DATE)
  if (slash) {
    return withTimeOfDay(reference, text, expandYear(slash[3], year), Number(slash[2]), Number(slash[1]))
  }

  const spanish = text.match(SPANISH_DATE) ?? text.match(ENGLISH_DAY_MONTH)
  if (spanish) {
    const month = MONTHS.get(spanish[2] ?? "")
    if (month === undefined) return Option.none()
    return withTimeOfDay(reference, text, expandYear(spanish[3], year), month, Number(spanish[1]))
  }

  const english = text.match(ENGLISH_MONTH_DAY)
  if (english) {
    const month = MONTHS.get(english[1] ?? "")
    if (month === undefined) return Option.none()
    return withTimeOfDay(reference, text, expandYear(english[3], year), month, Number(english[2]))
  }

  return Option.none()
}

const parseQuantity = (token: string): number | undefined =>
  /^\d+$/.test(token) ? Number(token) : NUMBERS.get(token)

export const subtractMonths = (date: Date, months: number): Date => {
  const total = date.getUTCFullYear() * 12 + date.getUTCMonth() - months
  const year = Math.floor(total / 12)
  const monthIndex = total - year * 12
  const day = Math.min(date.getUTCDate(), daysInMonth(year, monthIndex + 1))
  const result = new Date(date.getTime())
  result.setUTCFullYear(year, monthIndex, day)
  return result
}

const shift = (reference: Date, amount: number, unit: Unit, calendar: boolean): Date => {
  const at = reference.getTime()
  switch (unit) {
    case "minute":
      return new Date(at - amount * MINUTE_MS)
    case "hour":
      return new Date(at - amount * 60 * MINUTE_MS)
    case "day":
      return new Date(at - amount * DAY_MS)
    case "week":
      return new Date(at - amount * 7 * DAY_MS)
    case "month":
      return calendar ? subtractMonths(reference, amount) : new Date(at - amount * 30 * DAY_MS)
    case "year":
      return calendar ? subtractMonths(reference, amount * 12) : new Date(at - amount * 365 * DAY_MS)
  }
}

const subtract = (reference: Date, amount: number, unit: Unit, calendar: boolean): Option.Option<Date> =>
  validDate(shift(reference, amount, unit, calendar))

const quantified = (reference: Date, text: string, calendar: boolean): Option.Option<Date> => {
  const match = text.match(SPANISH_AGO) ?? text.match(ENGLISH_AGO)
  if (!match) return Option.none()
  const amount = parseQuantity(match[1] ?? "")
  const unit = UNIT_WORDS.get(match[2] ?? "")
  if (amount === undefined || unit === undefined) return Option.none()
  return subtract(reference, amount, unit, calendar)
}

const keyword = (reference: Date, text: string): Option.Option<Date> => {
  if (TWO_DAYS_BACK.test(text)) return subtract(reference, 2, "day", true)
  if (ONE_DAY_BACK.test(text)) return subtract(reference, 1, "day", true)
  if (SAME_DAY.test(text)) return Option.some(new Date(reference.getTime()))
  return Option.none()
}

/**
 * Turns a temporal phrase ("hace 2 meses", "ayer", "3 days ago", "12/05")
 * into an absolute wall-clock time anchored at `reference`.
 *
 * Absolute dates win over quantified phrases, which win over keywords.
 * Phrases with no recognisable cue resolve to `None`.
 */
export const resolve = (
  reference: Date,
  phrase: string,
  options: ResolveOptions = {}
): Option.Option<Date> => {
  const text = simplify(phrase)
  if (text === "") return Option.none()
  const calendar = options.calendar ?? true
  return absoluteDate(reference, text).pipe(
    Option.orElse(() => quantified(reference, text, calendar)),
    Option.orElse(() => keyword(reference, text))
  )
}

/** Same as {@link resolve}, printed as `DD/MM/YYYY HH:MM:SS`; `""` when unresolved. */
export const resolveToString = (reference: Date, phrase: string, options: ResolveOptions = {}): string =>
  Option.match(resolve(reference, phrase, options), {
    onNone: () => "",
    onSome: formatTimestamp,
  })
