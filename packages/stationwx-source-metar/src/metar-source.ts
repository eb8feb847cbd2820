import type { ActionDefinition, Context, FeedItemSignals, FeedSource } from "@stationwx/core"

import { TimeRelevance, UnknownActionError } from "@stationwx/core"
import { decodeMetar, type WeatherObservation } from "@stationwx/metar"

import { DefaultAviationWeatherClient, normalizeStation, type AviationWeatherClient } from "./aviationweather"
import { MetarFeedItemType, type MetarFeedItem } from "./feed-items"
import { MetarKey, type MetarReport } from "./metar-context"

export interface MetarSourceOptions {
	/** ICAO station identifier, e.g. "KTIK" */
	station: string
	client?: AviationWeatherClient
	/** Used to build the default client when `client` is not given */
	baseUrl?: string
	timeoutMs?: number
}

const BASE_URGENCY = {
	severe: 0.8,
	weather: 0.5,
	routine: 0.3,
} as const

const SEVERE_PHENOMENA = ["thunderstorm", "tornado", "squalls", "heavy"]

/**
 * A FeedSource that decodes the latest METAR for one station.
 *
 * Provides the decoded report as context for downstream sources and a single
 * observation feed item per refresh.
 *
 * @example
 * ```ts
 * const source = new MetarSource({ station: "KTIK" })
 * const items = await source.fetchItems({ time: new Date() })
 * ```
 */
export class MetarSource implements FeedSource<MetarFeedItem> {
	readonly id = "stationwx.metar"

	readonly station: string
	private readonly client: AviationWeatherClient

	constructor(options: MetarSourceOptions) {
		this.station = normalizeStation(options.station)
		this.client =
			options.client ??
			new DefaultAviationWeatherClient({ baseUrl: options.baseUrl, timeoutMs: options.timeoutMs })
	}

	async listActions(): Promise<Record<string, ActionDefinition>> {
		return {}
	}

	async executeAction(actionId: string): Promise<void> {
		throw new UnknownActionError(actionId)
	}

	async fetchContext(context: Context): Promise<Partial<Context> | null> {
		const report = await this.fetchReport(context.time)
		if (!report) {
			return null
		}
		return { [MetarKey]: report }
	}

	async fetchItems(context: Context): Promise<MetarFeedItem[]> {
		const report = await this.fetchReport(context.time)
		if (!report) {
			return []
		}
		return [createObservationFeedItem(report, context.time)]
	}

	/**
	 * Fetches and decodes the latest report. Null when the report body is empty.
	 */
	async fetchReport(now: Date): Promise<MetarReport | null> {
		const latest = await this.client.fetchLatest(this.station)
		const result = decodeMetar(latest.rawText)
		if (!result.ok) {
			console.warn(`[${this.id}] ${this.station}: report has no data`)
			return null
		}

		return {
			station: latest.station,
			rawText: latest.rawText,
			observedAt: latest.observedAt,
			ageMinutes: observationAgeMinutes(latest.observedAt, now),
			observation: result.observation,
		}
	}
}

export function observationAgeMinutes(observedAt: Date, now: Date): number {
	return Math.max(0, Math.floor((now.getTime() - observedAt.getTime()) / 60_000))
}

export function signalsForObservation(observation: WeatherObservation): FeedItemSignals {
	const conditions = observation.presentConditions
	if (!conditions) {
		return { urgency: BASE_URGENCY.routine, timeRelevance: TimeRelevance.Ambient }
	}
	if (SEVERE_PHENOMENA.some((phenomenon) => conditions.includes(phenomenon))) {
		return { urgency: BASE_URGENCY.severe, timeRelevance: TimeRelevance.Imminent }
	}
	return { urgency: BASE_URGENCY.weather, timeRelevance: TimeRelevance.Upcoming }
}

function createObservationFeedItem(report: MetarReport, timestamp: Date): MetarFeedItem {
	return {
		id: `metar-${report.station}-${report.observedAt.getTime()}`,
		type: MetarFeedItemType.observation,
		timestamp,
		data: {
			station: report.station,
			rawText: report.rawText,
			observedAt: report.observedAt,
			ageMinutes: report.ageMinutes,
			observation: report.observation,
		},
		signals: signalsForObservation(report.observation),
	}
}
