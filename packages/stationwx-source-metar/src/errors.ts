export class InvalidStationError extends Error {
	readonly station: string

	constructor(station: string) {
		super(`Invalid station identifier: ${station}`)
		this.name = "InvalidStationError"
		this.station = station
	}
}

export class StationNotFoundError extends Error {
	readonly station: string

	constructor(station: string) {
		super(`Station not found: ${station}`)
		this.name = "StationNotFoundError"
		this.station = station
	}
}

export class MetarFetchError extends Error {
	readonly station: string

	constructor(station: string, message: string, options?: { cause?: unknown }) {
		super(`Failed to fetch METAR for ${station}: ${message}`, options)
		this.name = "MetarFetchError"
		this.station = station
	}
}
