import { Context, Effect, Layer, Schema } from "effect"
import { LlmClient } from "./llm/client.js"
import { completeText, userMessage } from "./llm/completion.js"
import { aiConfig } from "../config/ai.js"
import { loadConfig } from "../config/load.js"
import { defaultNameAliases } from "../config/rules.js"
import { decodeExtraction, type DecodedResult } from "../codec/event-codec.js"
import { decodeModelJson, stripMarkdown } from "../codec/model-output.js"
import { AnimalProfile } from "../domain/animal.js"
import type { ConfigurationError, MalformedExtraction, TransientFailure } from "../domain/errors.js"
import type { ImagePayload } from "../domain/source.js"
import { formatTimestamp } from "../temporal/timestamp.js"
import { animalProfilesPrompt, captionEventsPrompt, fillTemplate, promptVersion } from "../prompts.js"

const ProfileList = Schema.Array(AnimalProfile)

type ExtractionFailure = TransientFailure | MalformedExtraction

export class AnimalExtractor extends Context.Tag("@rescuelog/AnimalExtractor")<
  AnimalExtractor,
  {
    /** Names and events of the animals a post talks about. */
    readonly extractAnimal: (
      images: readonly ImagePayload[],
      caption: string,
      asOf: Date
    ) => Effect.Effect<DecodedResult, ExtractionFailure>
    /** Attributes of newly registered animals, one call for all of them. */
    readonly extractProfiles: (
      images: readonly ImagePayload[],
      caption: string,
      names: readonly string[]
    ) => Effect.Effect<readonly AnimalProfile[], ExtractionFailure>
  }
>() {
  static readonly Live: Layer.Layer<AnimalExtractor, ConfigurationError, LlmClient> = Layer.effect(
    this,
    Effect.gen(function* () {
      const client = yield* LlmClient
      const config = yield* loadConfig(aiConfig)

      return {
        extractAnimal: Effect.fn("AnimalExtractor.extractAnimal")(function* (
          images: readonly ImagePayload[],
          caption: string,
          asOf: Date
        ) {
          const prompt = fillTemplate(captionEventsPrompt, {
            PUBLISHED_AT: formatTimestamp(asOf),
            CAPTION: caption,
          })

          const text = yield* completeText(client, "extractAnimal", {
            model: config.extractionModel,
            messages: [
              { role: "system", content: "Extract the animals and events of the post. Reply with the compact encoding only." },
              userMessage(prompt, images),
            ],
            temperature: 0,
          })
          yield* Effect.logDebug("caption extraction").pipe(
            Effect.annotateLogs({ prompt: promptVersion(captionEventsPrompt), reply: text })
          )

          return yield* decodeExtraction(text, { aliases: defaultNameAliases })
        }),

        extractProfiles: Effect.fn("AnimalExtractor.extractProfiles")(function* (
          images: readonly ImagePayload[],
          caption: string,
          names: readonly string[]
        ) {
          if (names.length === 0) return []

          const prompt = fillTemplate(animalProfilesPrompt, {
            NAMES: names.join(", "),
            CAPTION: caption,
          })

          const text = yield* completeText(client, "extractProfiles", {
            model: config.extractionModel,
            messages: [
              { role: "system", content: "Describe the animals in the photos. Return valid JSON only." },
              userMessage(prompt, images),
            ],
            temperature: 0,
          })

          if (stripMarkdown(text).toUpperCase() === "IGNORAR") return []

          return yield* decodeModelJson(ProfileList, text)
        }),
      }
    })
  )
}
