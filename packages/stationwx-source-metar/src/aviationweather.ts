// Aviation Weather Center data API client
// https://aviationweather.gov/data/api/

import { type } from "arktype"

import { InvalidStationError, MetarFetchError, StationNotFoundError } from "./errors"

export const AVIATIONWEATHER_API_BASE = "https://aviationweather.gov"

const DEFAULT_TIMEOUT_MS = 2000

const STATION_PATTERN = /^[A-Z0-9]{3,4}$/

/**
 * The latest report for a station, still encoded.
 */
export interface StationReport {
	station: string
	rawText: string
	/** Observation instant from the API envelope, not from the report's time group */
	observedAt: Date
}

export interface AviationWeatherClient {
	fetchLatest(station: string): Promise<StationReport>
}

export interface AviationWeatherClientOptions {
	baseUrl?: string
	/** Abort the request after this many milliseconds (default: 2000) */
	timeoutMs?: number
}

/**
 * Upper-cases a station identifier and checks it looks like an ICAO code.
 */
export function normalizeStation(station: string): string {
	const normalized = station.trim().toUpperCase()
	if (!STATION_PATTERN.test(normalized)) {
		throw new InvalidStationError(station)
	}
	return normalized
}

export class DefaultAviationWeatherClient implements AviationWeatherClient {
	private readonly baseUrl: string
	private readonly timeoutMs: number

	constructor(options: AviationWeatherClientOptions = {}) {
		this.baseUrl = options.baseUrl ?? AVIATIONWEATHER_API_BASE
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
	}

	async fetchLatest(station: string): Promise<StationReport> {
		const id = normalizeStation(station)

		const url = new URL("/api/data/metar", this.baseUrl)
		url.searchParams.set("ids", id)
		url.searchParams.set("format", "json")

		let response: Response
		try {
			response = await fetch(url.toString(), {
				signal: AbortSignal.timeout(this.timeoutMs),
			})
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error)
			throw new MetarFetchError(id, reason, { cause: error })
		}

		// The API answers 204 when no station matched.
		if (response.status === 204) {
			throw new StationNotFoundError(id)
		}
		if (!response.ok) {
			throw new MetarFetchError(id, `${response.status} ${response.statusText}`)
		}

		let json: unknown
		try {
			json = await response.json()
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error)
			throw new MetarFetchError(id, `unreadable response: ${reason}`, { cause: error })
		}

		const result = metarResponseSchema(json)
		if (result instanceof type.errors) {
			throw new MetarFetchError(id, `invalid response: ${result.summary}`)
		}

		const latest = result.reduce<MetarEntry | null>(
			(newest, entry) => (newest === null || entry.obsTime > newest.obsTime ? entry : newest),
			null,
		)
		if (!latest) {
			throw new StationNotFoundError(id)
		}

		return {
			station: latest.icaoId,
			rawText: latest.rawOb.trim(),
			observedAt: new Date(latest.obsTime * 1000),
		}
	}
}

// Schemas

const metarEntrySchema = type({
	icaoId: "string",
	/** Epoch seconds */
	obsTime: "number",
	rawOb: "string",
})

type MetarEntry = typeof metarEntrySchema.infer

const metarResponseSchema = metarEntrySchema.array()
