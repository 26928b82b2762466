import { Data } from "effect"

export type ImagePayload = Data.TaggedEnum<{
  Url: { readonly url: string }
  Bytes: { readonly data: Uint8Array; readonly mimeType: string }
}>

export const ImagePayload = Data.taggedEnum<ImagePayload>()

export const toImageUrl = (image: ImagePayload): string =>
  ImagePayload.$match(image, {
    Url: ({ url }) => url,
    Bytes: ({ data, mimeType }) => `data:${mimeType};base64,${Buffer.from(data).toString("base64")}`,
  })

export interface MediaItem {
  readonly id: string
  readonly url: string
}

/** A post (or an equivalent standalone photo) to reconcile. */
export interface SourceRecord {
  readonly id: string
  readonly caption: string
  /** Publish time, wall clock. */
  readonly publishedAt: Date
  readonly permalink: string
  readonly mediaUrl: string
  readonly children: readonly MediaItem[]
  readonly images: readonly ImagePayload[]
}
