/**
 * Parse a decimal string. Blank, non-numeric and non-finite input yields the fallback.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  const trimmed = value?.trim()
  if (!trimmed) {
    return fallback
  }

  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : fallback
}
