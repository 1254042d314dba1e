/**
 * Display form of an athlete name: NFKC, trimmed, internal whitespace runs
 * collapsed to one space. Case is preserved.
 */
export function normalizeAthleteName(raw: string): string {
  return raw.normalize('NFKC').trim().replace(/\s+/g, ' ')
}

/**
 * Lookup key for a job. Names that differ only in case or whitespace map to
 * the same key; any other difference gives a distinct key.
 *
 * Returns null when nothing is left after normalisation.
 */
export function deriveJobKey(raw: string): string | null {
  const name = normalizeAthleteName(raw)
  if (name.length === 0) return null
  return name.toLowerCase()
}
