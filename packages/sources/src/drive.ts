import { HttpClient, HttpClientRequest } from "@effect/platform"
import { Config, Context, Effect, Layer, Option, Redacted, Schema } from "effect"
import {
  fromIsoWallClock,
  ImagePayload,
  loadConfig,
  type ConfigurationError,
  type SourceRecord,
  type TransientFailure,
} from "@rescuelog/core"
import { PostSource, ReceiptSource } from "@rescuelog/core/services"
import { REQUEST_TIMEOUT, transient } from "./errors.js"

const DriveConfig = Config.all({
  accessToken: Config.redacted("GOOGLE_ACCESS_TOKEN"),
  baseUrl: Config.string("DRIVE_API_URL").pipe(Config.withDefault("https://www.googleapis.com/drive/v3")),
})

export const DriveFile = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
  mimeType: Schema.String,
  createdTime: Schema.String,
})
export type DriveFile = typeof DriveFile.Type

const FileList = Schema.Struct({
  files: Schema.Array(DriveFile),
  nextPageToken: Schema.optional(Schema.String),
})

export interface DownloadedFile {
  readonly data: Uint8Array
  readonly mimeType: string
}

/** Public link the spreadsheet stores for a Drive file. */
export const driveUrl = (fileId: string): string => `https://drive.google.com/uc?id=${fileId}`

export class DriveClient extends Context.Tag("@rescuelog/DriveClient")<
  DriveClient,
  {
    readonly listFiles: (folderId: string) => Effect.Effect<readonly DriveFile[], TransientFailure>
    readonly download: (fileId: string) => Effect.Effect<DownloadedFile, TransientFailure>
    readonly move: (fileId: string, from: string, to: string) => Effect.Effect<void, TransientFailure>
  }
>() {
  static readonly Live: Layer.Layer<DriveClient, ConfigurationError, HttpClient.HttpClient> = Layer.effect(
    this,
    Effect.gen(function* () {
      const { accessToken, baseUrl } = yield* loadConfig(DriveConfig)
      const client = (yield* HttpClient.HttpClient).pipe(
        HttpClient.filterStatusOk,
        HttpClient.mapRequest(HttpClientRequest.bearerToken(Redacted.value(accessToken)))
      )

      const listPage = (folderId: string, pageToken: string | undefined) =>
        client
          .get(`${baseUrl}/files`, {
            urlParams: {
              q: `'${folderId}' in parents and trashed = false`,
              fields: "nextPageToken,files(id,name,mimeType,createdTime)",
              orderBy: "createdTime",
              pageSize: "100",
              ...(pageToken === undefined ? {} : { pageToken }),
            },
          })
          .pipe(
            Effect.flatMap((res) => res.json),
            Effect.flatMap(Schema.decodeUnknown(FileList)),
            Effect.timeout(REQUEST_TIMEOUT),
            Effect.scoped,
            Effect.mapError(transient("drive.listFiles"))
          )

      return {
        listFiles: (folderId) =>
          Effect.gen(function* () {
            const files: DriveFile[] = []
            let pageToken: string | undefined
            do {
              const page: typeof FileList.Type = yield* listPage(folderId, pageToken)
              files.push(...page.files)
              pageToken = page.nextPageToken
            } while (pageToken !== undefined)
            return files
          }),

        download: (fileId) =>
          client.get(`${baseUrl}/files/${fileId}`, { urlParams: { alt: "media" } }).pipe(
            Effect.flatMap((res) =>
              Effect.map(res.arrayBuffer, (buffer) => ({
                data: new Uint8Array(buffer),
                mimeType: res.headers["content-type"]?.split(";")[0]?.trim() || "image/jpeg",
              }))
            ),
            Effect.timeout(REQUEST_TIMEOUT),
            Effect.scoped,
            Effect.mapError(transient("drive.download"))
          ),

        move: (fileId, from, to) =>
          client
            .patch(`${baseUrl}/files/${fileId}`, { urlParams: { addParents: to, removeParents: from } })
            .pipe(Effect.asVoid, Effect.timeout(REQUEST_TIMEOUT), Effect.scoped, Effect.mapError(transient("drive.move"))),
      }
    })
  )
}

const ReceiptFolders = Config.all({
  receipts: Config.string("FOLDER_RECEIPTS"),
  ok: Config.string("FOLDER_OK"),
  error: Config.string("FOLDER_ERROR"),
})

/** A photo dropped in the animals folder, handled like a post without caption. */
export const photoRecord = (file: DriveFile): Option.Option<SourceRecord> =>
  Option.map(fromIsoWallClock(file.createdTime), (publishedAt) => ({
    id: file.id,
    caption: "",
    publishedAt,
    permalink: driveUrl(file.id),
    mediaUrl: driveUrl(file.id),
    children: [],
    images: [],
  }))

export const DrivePhotoSource = {
  Live: Layer.effect(
    PostSource,
    Effect.gen(function* () {
      const drive = yield* DriveClient
      const folder = yield* loadConfig(Config.string("FOLDER_ANIMALS"))

      return PostSource.of({
        listPosts: ({ since }) =>
          Effect.map(drive.listFiles(folder), (files) =>
            files
              .filter((file) => file.mimeType.startsWith("image/"))
              .flatMap((file) => Option.toArray(photoRecord(file)))
              .filter((record) => !since || record.publishedAt.getTime() >= since.getTime())
              .sort((a, b) => a.publishedAt.getTime() - b.publishedAt.getTime())
          ),
        loadImages: (record) =>
          Effect.map(drive.download(record.id), ({ data, mimeType }) => ({
            ...record,
            images: [ImagePayload.Bytes({ data, mimeType })],
          })),
      })
    })
  ),
}

export interface ReceiptSourceOptions {
  /** Log the folder moves instead of making them. */
  readonly dryRun?: boolean
}

export const DriveReceiptSource = {
  layer: (options: ReceiptSourceOptions = {}) => Layer.effect(
    ReceiptSource,
    Effect.gen(function* () {
      const drive = yield* DriveClient
      const folders = yield* loadConfig(ReceiptFolders)

      return ReceiptSource.of({
        listReceipts: () =>
          Effect.map(drive.listFiles(folders.receipts), (files) =>
            files
              .filter((file) => file.mimeType.startsWith("image/"))
              .map((file) => ({ id: file.id, name: file.name, url: driveUrl(file.id) }))
          ),
        download: (file) =>
          Effect.map(drive.download(file.id), ({ data, mimeType }) => ImagePayload.Bytes({ data, mimeType })),
        settle: (file, outcome) => {
          const target = outcome === "ok" ? folders.ok : folders.error
          return options.dryRun
            ? Effect.logInfo(`[dry-run] ${file.name} would move to ${target}`)
            : drive.move(file.id, folders.receipts, target)
        },
      })
    })
  ),
}
