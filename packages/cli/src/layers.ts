import { FetchHttpClient, type HttpClient } from "@effect/platform"
import { Config, Effect, Layer, Logger, LogLevel } from "effect"
import { loadConfig, type ConfigurationError } from "@rescuelog/core"
import {
  AnimalExtractor,
  ExpenseLedger,
  LlmClientLive,
  ReceiptExtractor,
  Reconciler,
  type PostSource,
} from "@rescuelog/core/services"
import { SheetsTabularStore } from "@rescuelog/sheets"
import { DriveClient, DrivePhotoSource, DriveReceiptSource, InstagramPostSource } from "@rescuelog/sources"

export const LoggingLive = Layer.unwrapEffect(
  Effect.map(
    loadConfig(Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))),
    (level) => Logger.minimumLogLevel(level)
  )
)

const Store = (dryRun: boolean) => SheetsTabularStore.layer({ dryRun })

const Animals = AnimalExtractor.Live.pipe(Layer.provide(LlmClientLive))

export type PostOrigin = "instagram" | "drive"

export const postsLayer = (origin: PostOrigin, dryRun: boolean) => {
  const Source: Layer.Layer<PostSource, ConfigurationError, HttpClient.HttpClient> =
    origin === "instagram"
      ? InstagramPostSource.Live
      : DrivePhotoSource.Live.pipe(Layer.provide(DriveClient.Live))

  return Layer.mergeAll(Reconciler.Live, Source).pipe(
    Layer.provideMerge(Animals),
    Layer.provide(Store(dryRun)),
    Layer.provide(FetchHttpClient.layer)
  )
}

export const receiptsLayer = (dryRun: boolean) =>
  Layer.mergeAll(
    ExpenseLedger.Live,
    ReceiptExtractor.Live.pipe(Layer.provide(LlmClientLive)),
    DriveReceiptSource.layer({ dryRun }).pipe(Layer.provide(DriveClient.Live))
  ).pipe(
    Layer.provide(Store(dryRun)),
    Layer.provide(FetchHttpClient.layer)
  )

export const ledgerLayer = (dryRun: boolean) =>
  ExpenseLedger.Live.pipe(
    Layer.provide(Store(dryRun)),
    Layer.provide(FetchHttpClient.layer)
  )
