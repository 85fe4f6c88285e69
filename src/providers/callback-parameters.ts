/**
 * Query parameters as delivered on the provider's OAuth redirect.
 * Keys are matched case-insensitively; the first value wins on duplicates.
 */
export type CallbackParameters =
  | URLSearchParams
  | Map<string, string>
  | Record<string, string | undefined>

export type NormalizedParameters = ReadonlyMap<string, string>

const entriesOf = (
  params: CallbackParameters,
): Iterable<[string, string | undefined]> => {
  if (params instanceof URLSearchParams || params instanceof Map) {
    return params.entries()
  }
  return Object.entries(params)
}

export const normalizeParameters = (
  params: CallbackParameters,
): NormalizedParameters => {
  const normalized = new Map<string, string>()
  for (const [key, value] of entriesOf(params)) {
    const lowerKey = key.toLowerCase()
    if (value === undefined || normalized.has(lowerKey)) {
      continue
    }
    normalized.set(lowerKey, value)
  }
  return normalized
}
