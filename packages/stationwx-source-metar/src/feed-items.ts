import type { FeedItem } from "@stationwx/core"
import type { WeatherObservation } from "@stationwx/metar"

export const MetarFeedItemType = {
	observation: "metar-observation",
} as const

export type MetarFeedItemType = (typeof MetarFeedItemType)[keyof typeof MetarFeedItemType]

export type MetarObservationData = {
	station: string
	rawText: string
	observedAt: Date
	ageMinutes: number
	observation: WeatherObservation
}

export interface MetarFeedItem extends FeedItem<
	typeof MetarFeedItemType.observation,
	MetarObservationData
> {}
