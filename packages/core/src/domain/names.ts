/** Placeholder for animals whose name the caption does not give. */
export const UNNAMED = "sin_nombre"

const UNNAMED_SPELLINGS: ReadonlySet<string> = new Set(["sin_nombre", "sin nombre", "unnamed", "sin_name"])

export type NameAliases = ReadonlyMap<string, string>

const collapse = (value: string): string =>
  value
    .normalize("NFD")
    .replace(/\p{M}+/gu, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_]/gu, "")
    .replace(/\s+/g, " ")
    .trim()

/**
 * Lowercases, strips accents, punctuation and emoji, and collapses whitespace.
 * Diminutives are mapped only through `aliases`.
 */
export const normalizeName = (raw: string, aliases: NameAliases = new Map()): string => {
  const name = collapse(raw)
  if (UNNAMED_SPELLINGS.has(name)) return UNNAMED
  return aliases.get(name) ?? name
}

export const isUnnamed = (name: string): boolean => name === UNNAMED
