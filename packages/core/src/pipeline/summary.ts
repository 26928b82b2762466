export interface BatchSummary {
  readonly written: number
  readonly duplicates: number
  readonly institutional: number
  readonly failed: number
}

export const emptySummary: BatchSummary = { written: 0, duplicates: 0, institutional: 0, failed: 0 }

export const count = (summary: BatchSummary, field: keyof BatchSummary, by = 1): BatchSummary => ({
  ...summary,
  [field]: summary[field] + by,
})

export const formatSummary = (summary: BatchSummary): string =>
  `written=${summary.written} duplicates=${summary.duplicates} institutional=${summary.institutional} failed=${summary.failed}`
