import { HttpClient } from "@effect/platform"
import { Config, Effect, Layer, Option, Redacted, Schema } from "effect"
import {
  fromIsoWallClock,
  ImagePayload,
  loadConfig,
  type MediaItem,
  type SourceRecord,
} from "@rescuelog/core"
import { PostSource } from "@rescuelog/core/services"
import { REQUEST_TIMEOUT, transient } from "./errors.js"

const InstagramConfig = Config.all({
  userId: Config.string("IG_USER_ID"),
  accessToken: Config.redacted("IG_ACCESS_TOKEN"),
  baseUrl: Config.string("IG_GRAPH_URL").pipe(Config.withDefault("https://graph.facebook.com/v22.0")),
  pageSize: Config.integer("IG_PAGE_SIZE").pipe(Config.withDefault(50)),
})

const MEDIA_FIELDS =
  "id,caption,timestamp,permalink,media_type,media_url,thumbnail_url,children{id,media_type,media_url,thumbnail_url}"

const Child = Schema.Struct({
  id: Schema.String,
  media_type: Schema.optional(Schema.String),
  media_url: Schema.optional(Schema.String),
  thumbnail_url: Schema.optional(Schema.String),
})

export const InstagramMedia = Schema.Struct({
  id: Schema.String,
  caption: Schema.optional(Schema.String),
  timestamp: Schema.String,
  permalink: Schema.String,
  media_type: Schema.String,
  media_url: Schema.optional(Schema.String),
  thumbnail_url: Schema.optional(Schema.String),
  children: Schema.optional(Schema.Struct({ data: Schema.Array(Child) })),
})
export type InstagramMedia = typeof InstagramMedia.Type

const MediaPage = Schema.Struct({
  data: Schema.Array(InstagramMedia),
  paging: Schema.optional(Schema.Struct({ next: Schema.optional(Schema.String) })),
})

// Videos carry their still frame in thumbnail_url.
const displayUrl = (media: { readonly thumbnail_url?: string; readonly media_url?: string }): string =>
  media.thumbnail_url ?? media.media_url ?? ""

export const toSourceRecord = (media: InstagramMedia): Option.Option<SourceRecord> =>
  Option.map(fromIsoWallClock(media.timestamp), (publishedAt) => {
    const children: MediaItem[] = (media.children?.data ?? []).map((child) => ({ id: child.id, url: displayUrl(child) }))
    const mediaUrl = displayUrl(media)
    const urls = children.length > 0 ? children.map((child) => child.url) : [mediaUrl]
    return {
      id: media.id,
      caption: media.caption ?? "",
      publishedAt,
      permalink: media.permalink,
      mediaUrl,
      children,
      images: urls.filter((url) => url !== "").map((url) => ImagePayload.Url({ url })),
    }
  })

export const InstagramPostSource = {
  Live: Layer.effect(
    PostSource,
    Effect.gen(function* () {
      const config = yield* loadConfig(InstagramConfig)
      const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk)

      const fetchPage = (url: string, first: boolean) =>
        client
          .get(url, {
            urlParams: first
              ? {
                  fields: MEDIA_FIELDS,
                  limit: String(config.pageSize),
                  access_token: Redacted.value(config.accessToken),
                }
              : {},
          })
          .pipe(
            Effect.flatMap((res) => res.json),
            Effect.flatMap(Schema.decodeUnknown(MediaPage)),
            Effect.timeout(REQUEST_TIMEOUT),
            Effect.scoped,
            Effect.mapError(transient("instagram.listPosts"))
          )

      return PostSource.of({
        listPosts: ({ since }) =>
          Effect.gen(function* () {
            const records: SourceRecord[] = []
            let next: string | undefined = `${config.baseUrl}/${config.userId}/media`
            let first = true
            // Pages come newest first; stop once a page reaches past `since`.
            while (next !== undefined) {
              const page: typeof MediaPage.Type = yield* fetchPage(next, first)
              first = false
              let reachedSince = false
              for (const media of page.data) {
                const record = toSourceRecord(media)
                if (Option.isNone(record)) {
                  yield* Effect.logWarning(`Skipping post ${media.id} with unreadable timestamp ${media.timestamp}`)
                  continue
                }
                if (since && record.value.publishedAt.getTime() < since.getTime()) {
                  reachedSince = true
                  continue
                }
                records.push(record.value)
              }
              next = reachedSince ? undefined : page.paging?.next
            }
            yield* Effect.logInfo(`Fetched ${records.length} posts`)
            return records.sort((a, b) => a.publishedAt.getTime() - b.publishedAt.getTime())
          }),
        loadImages: (record) => Effect.succeed(record),
      })
    })
  ),
}
