export const PROVIDER_TYPES = ['facebook'] as const

export type ProviderType = (typeof PROVIDER_TYPES)[number]
