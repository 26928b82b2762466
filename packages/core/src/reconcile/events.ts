import { Option } from "effect"
import { EventTime, type ExtractedEvent } from "../codec/event-codec.js"
import { statusRank } from "../domain/event.js"
import { resolve } from "../temporal/resolver.js"
import { formatTimestamp } from "../temporal/timestamp.js"

export interface TimedEvent {
  readonly event: ExtractedEvent
  /** Empty when the phrase could not be resolved. */
  readonly at: Option.Option<Date>
}

export interface ResolvedEvents {
  readonly events: readonly TimedEvent[]
  readonly unresolved: readonly string[]
}

const timeOf = (publishedAt: Date, time: EventTime): Option.Option<Date> =>
  EventTime.$match(time, {
    Published: () => Option.some(publishedAt),
    Absolute: ({ at }) => Option.some(at),
    Phrase: ({ text }) => resolve(publishedAt, text),
  })

/**
 * Anchors every event at the post's publish time, collapses events sharing a
 * time to the highest-precedence status and orders the rest chronologically.
 * Unresolved events keep their relative order and go last.
 */
export const resolveEvents = (publishedAt: Date, events: readonly ExtractedEvent[]): ResolvedEvents => {
  const timed = events.map((event) => ({ event, at: timeOf(publishedAt, event.time) }))
  const unresolved = timed.flatMap(({ event, at }) =>
    Option.isNone(at) && event.time._tag === "Phrase" ? [event.time.text] : []
  )

  const byTime = new Map<number, TimedEvent>()
  const undated: TimedEvent[] = []
  for (const entry of timed) {
    if (Option.isNone(entry.at)) {
      undated.push(entry)
      continue
    }
    const key = entry.at.value.getTime()
    const current = byTime.get(key)
    if (!current || statusRank(entry.event.status) > statusRank(current.event.status)) {
      byTime.set(key, entry)
    }
  }

  const dated = [...byTime.entries()].sort(([a], [b]) => a - b).map(([, entry]) => entry)
  return { events: [...dated, ...undated], unresolved }
}

export const formatEventTime = (at: Option.Option<Date>): string =>
  Option.match(at, { onNone: () => "", onSome: formatTimestamp })
