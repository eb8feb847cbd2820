/**
 * Branded type for type-safe context keys.
 *
 * Each package defines its own keys with associated value types:
 * ```ts
 * const MetarKey: ContextKey<MetarReport> = contextKey("metar")
 * ```
 */
export type ContextKey<T> = string & { __contextValue?: T }

/**
 * Creates a typed context key.
 */
export function contextKey<T>(key: string): ContextKey<T> {
	return key as ContextKey<T>
}

/**
 * Type-safe accessor for context values.
 *
 * @example
 * ```ts
 * const report = contextValue(context, MetarKey)
 * if (report) {
 *   console.log(report.station, report.observation.temperatureF)
 * }
 * ```
 */
export function contextValue<T>(context: Partial<Context>, key: ContextKey<T>): T | undefined {
	return context[key] as T | undefined
}

/**
 * Arbitrary key-value bag representing the current state.
 * Always includes `time`, the instant a refresh was requested.
 */
export interface Context {
	time: Date
	[key: string]: unknown
}
