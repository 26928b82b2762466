import { Config, Duration, Redacted } from "effect"

export const REQUEST_TIMEOUT = Duration.seconds(30)

export interface SheetsConfig {
  readonly accessToken: Redacted.Redacted
  readonly spreadsheetId: string
  readonly baseUrl: string
}

export const sheetsConfig: Config.Config<SheetsConfig> = Config.all({
  accessToken: Config.redacted("GOOGLE_ACCESS_TOKEN"),
  spreadsheetId: Config.string("SPREADSHEET_ID"),
  baseUrl: Config.string("SHEETS_API_URL").pipe(
    Config.withDefault("https://sheets.googleapis.com/v4")
  ),
})
