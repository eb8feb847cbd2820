import type { ContextKey } from "@stationwx/core"
import type { WeatherObservation } from "@stationwx/metar"

import { contextKey } from "@stationwx/core"

/**
 * Decoded latest report for a station, shared with downstream sources.
 */
export interface MetarReport {
	station: string
	rawText: string
	observedAt: Date
	/** Whole minutes between the observation and the refresh, never negative */
	ageMinutes: number
	observation: WeatherObservation
}

export const MetarKey: ContextKey<MetarReport> = contextKey("metar")
