import { Context, type Effect } from "effect"
import type { TransientFailure } from "../domain/errors.js"
import type { ImagePayload, SourceRecord } from "../domain/source.js"

export interface ListPostsOptions {
  /** Only posts published at or after this wall-clock time. */
  readonly since?: Date
}

/** Posts (or standalone animal photos) oldest first. */
export class PostSource extends Context.Tag("@rescuelog/PostSource")<
  PostSource,
  {
    readonly listPosts: (options: ListPostsOptions) => Effect.Effect<readonly SourceRecord[], TransientFailure>
    /** Fills `images`; called only for records that still need processing. */
    readonly loadImages: (record: SourceRecord) => Effect.Effect<SourceRecord, TransientFailure>
  }
>() {}

export interface ReceiptFile {
  readonly id: string
  readonly name: string
  readonly url: string
}

export class ReceiptSource extends Context.Tag("@rescuelog/ReceiptSource")<
  ReceiptSource,
  {
    readonly listReceipts: () => Effect.Effect<readonly ReceiptFile[], TransientFailure>
    readonly download: (file: ReceiptFile) => Effect.Effect<ImagePayload, TransientFailure>
    /** Files the receipt away in the ok or error folder. */
    readonly settle: (file: ReceiptFile, outcome: "ok" | "error") => Effect.Effect<void, TransientFailure>
  }
>() {}
