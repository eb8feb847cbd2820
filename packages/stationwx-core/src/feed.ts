/**
 * How time-sensitive a feed item is relative to now.
 */
export const TimeRelevance = {
	/** Needs attention now (e.g., thunderstorm at the field) */
	Imminent: "imminent",
	/** Relevant soon (e.g., rain or reduced visibility being reported) */
	Upcoming: "upcoming",
	/** Background information (e.g., a routine fair-weather observation) */
	Ambient: "ambient",
} as const

export type TimeRelevance = (typeof TimeRelevance)[keyof typeof TimeRelevance]

export interface FeedItemSignals {
	/** Source-assessed urgency (0-1). */
	urgency?: number
	timeRelevance?: TimeRelevance
}

/**
 * A single item in the feed.
 *
 * @example
 * ```ts
 * type ObservationItem = FeedItem<"metar-observation", { station: string }>
 *
 * const item: ObservationItem = {
 *   id: "metar-KTIK-1767225300000",
 *   type: "metar-observation",
 *   timestamp: new Date(),
 *   data: { station: "KTIK" },
 *   signals: { urgency: 0.3, timeRelevance: "ambient" },
 * }
 * ```
 */
export interface FeedItem<
	TType extends string = string,
	TData extends Record<string, unknown> = Record<string, unknown>,
> {
	/** Unique identifier */
	id: string
	/** Item type, matches the source's item type */
	type: TType
	/** When this item was generated */
	timestamp: Date
	/** Type-specific payload */
	data: TData
	/** Source-provided hints for ranking. Omit if no signals apply. */
	signals?: FeedItemSignals
}
