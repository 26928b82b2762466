import { readFileSync } from "node:fs"

const load = (file: string): string =>
  readFileSync(new URL(`../prompts/${file}`, import.meta.url), "utf8")

export const captionEventsPrompt = load("caption-events.md")
export const animalProfilesPrompt = load("animal-profiles.md")
export const receiptPrompt = load("receipt.md")

/** Version tag from a template's `<!-- name vN -->` header. */
export const promptVersion = (template: string): string =>
  template.match(/^<!--\s*(.+?)\s*-->/)?.[1] ?? "unversioned"

export const fillTemplate = (template: string, values: Readonly<Record<string, string>>): string =>
  template.replace(/\{\{([A-Z_]+)\}\}/g, (placeholder, key: string) => values[key] ?? placeholder)
