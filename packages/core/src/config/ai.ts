import { Config } from "effect"

export interface AIConfig {
  readonly extractionModel: string
}

export const aiConfig = Config.all({
  extractionModel: Config.string("MODEL_EXTRACTION").pipe(
    Config.withDefault("gpt-4o")
  ),
})
