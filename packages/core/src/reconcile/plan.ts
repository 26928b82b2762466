import { Option } from "effect"
import type { ExtractedEvent } from "../codec/event-codec.js"
import { Animal, type AnimalProfile, undeterminedProfile } from "../domain/animal.js"
import { LookupAmbiguity } from "../domain/errors.js"
import { AnimalEvent } from "../domain/event.js"
import { Interaction } from "../domain/interaction.js"
import { isUnnamed, normalizeName, type NameAliases } from "../domain/names.js"
import type { SourceRecord } from "../domain/source.js"
import type { StoredRecord } from "../store/rows.js"
import type { Row } from "../services/tabular-store.js"
import { formatTimestamp, fromIsoWallClock, parseDayOrTimestamp } from "../temporal/timestamp.js"
import { formatEventTime, resolveEvents } from "./events.js"

/** Normalized animal name to identifier, first row wins. */
export const indexAnimals = (rows: readonly Row[], aliases: NameAliases = new Map()): ReadonlyMap<string, number> => {
  const known = new Map<string, number>()
  for (const row of rows) {
    const id = (row["id"] ?? "").trim()
    const name = normalizeName(row["nombre"] ?? "", aliases)
    if (!/^\d+$/.test(id) || name === "" || isUnnamed(name) || known.has(name)) continue
    known.set(name, Number(id))
  }
  return known
}

/**
 * Midnight of the latest registration day in the Animal table, accepting
 * `DD/MM/YYYY[ HH:MM:SS]` and `YYYY-MM-DD` values. Unreadable dates are skipped.
 */
export const latestRegistration = (rows: readonly Row[]): Option.Option<Date> => {
  const days = rows.flatMap((row) => {
    const day = (row["fecha"] ?? "").trim().split(" ")[0] ?? ""
    if (day === "") return []
    return Option.toArray(
      parseDayOrTimestamp(day).pipe(Option.orElse(() => fromIsoWallClock(`${day}T00:00`)))
    )
  })
  return days.length === 0 ? Option.none() : Option.some(new Date(Math.max(...days.map((d) => d.getTime()))))
}

/** Names that will get a new identifier. The Unnamed sentinel never matches. */
export const newNames = (names: readonly string[], known: ReadonlyMap<string, number>): readonly string[] =>
  names.filter((name) => isUnnamed(name) || !known.has(name))

export interface PlanInput {
  readonly record: SourceRecord
  readonly names: readonly string[]
  readonly events: readonly ExtractedEvent[]
  readonly known: ReadonlyMap<string, number>
  /** `max(Animal.id) + 1` */
  readonly nextId: number
  readonly profiles: readonly AnimalProfile[]
}

export interface Plan {
  readonly rows: readonly StoredRecord[]
  readonly created: readonly number[]
  readonly matched: readonly number[]
  readonly unresolved: readonly string[]
  readonly ambiguity: Option.Option<LookupAmbiguity>
}

interface Entity {
  readonly id: number
  readonly created: boolean
  readonly rows: readonly StoredRecord[]
}

// By name; otherwise the profile in the same position, unless it names another animal of the post.
const profileFor = (
  name: string,
  index: number,
  names: readonly string[],
  profiles: readonly AnimalProfile[]
): AnimalProfile => {
  const named = profiles.find((profile) => normalizeName(profile.name) === name)
  if (named) return named
  const positional = profiles[index]
  return positional && !names.includes(normalizeName(positional.name)) ? positional : undeterminedProfile(name)
}

/**
 * Rows one post adds to the store: per animal its Animal row (when new),
 * its Interaction row and the post's events under its identifier. When several
 * animals are created, only the last of them gets the events.
 */
export const planMutations = ({ record, names, events, known, nextId, profiles }: PlanInput): Plan => {
  const publishedAt = formatTimestamp(record.publishedAt)
  const useChildren = record.children.length >= names.length && record.children.length > 0

  let id = nextId
  let fresh = 0
  const entities = names.map((name, i): Entity => {
    const existing = isUnnamed(name) ? undefined : known.get(name)
    const media = useChildren ? record.children[i] : undefined
    const interaction = new Interaction({
      animalId: existing ?? id,
      at: publishedAt,
      postId: media?.id ?? record.id,
      permalink: record.permalink,
      mediaUrl: media?.url ?? record.mediaUrl,
    })

    if (existing !== undefined) {
      return { id: existing, created: false, rows: [{ _tag: "Interaction", value: interaction }] }
    }

    const profile = profileFor(name, fresh++, names, profiles)
    const animal = new Animal({
      id,
      name,
      registeredAt: publishedAt,
      species: profile.species,
      location: profile.location,
      age: profile.age,
      coat: profile.coat,
      health: profile.health,
      active: true,
      updatedAt: publishedAt,
    })
    const entity: Entity = {
      id,
      created: true,
      rows: [
        { _tag: "Animal", value: animal },
        { _tag: "Interaction", value: interaction },
      ],
    }
    id++
    return entity
  })

  const created = entities.filter((e) => e.created).map((e) => e.id)
  const matched = entities.filter((e) => !e.created).map((e) => e.id)
  // Co-created animals share one set of events; the last one takes them.
  const createdTarget = created[created.length - 1]

  const resolved = resolveEvents(record.publishedAt, events)
  const eventRowsFor = (animalId: number): readonly StoredRecord[] =>
    resolved.events.map(({ event, at }) => ({
      _tag: "Event",
      value: new AnimalEvent({
        animalId,
        location: event.location,
        status: event.status,
        at: formatEventTime(at),
        person: event.person,
        relation: event.relation,
      }),
    }))

  const rows = entities.flatMap((entity): readonly StoredRecord[] =>
    !entity.created || entity.id === createdTarget ? [...entity.rows, ...eventRowsFor(entity.id)] : entity.rows
  )

  const createdNames = names.filter((_, i) => entities[i]?.created === true)
  const ambiguity =
    created.length > 1 && createdTarget !== undefined && resolved.events.length > 0
      ? Option.some(
          new LookupAmbiguity({
            names: createdNames,
            assignedTo: createdTarget,
            message: `Events of a post introducing ${createdNames.join(", ")} assigned to animal ${createdTarget}`,
          })
        )
      : Option.none()

  return { rows, created, matched, unresolved: resolved.unresolved, ambiguity }
}
