export const CompassPoint = [
	"N",
	"NNE",
	"NE",
	"ENE",
	"E",
	"ESE",
	"SE",
	"SSE",
	"S",
	"SSW",
	"SW",
	"WSW",
	"W",
	"WNW",
	"NW",
	"NNW",
] as const

export type CompassPoint = (typeof CompassPoint)[number]

export const WindDirection = {
	Calm: "calm",
	Varies: "varies",
} as const

export type WindDirection = CompassPoint | (typeof WindDirection)[keyof typeof WindDirection]

export interface Wind {
	/** Compass point the wind blows from, or "calm" / "varies" */
	direction: WindDirection
	/** Null when calm */
	speedMph: number | null
	gustMph: number | null
}

export const VisibilityQualifier = {
	Exact: "exact",
	AtLeast: "at-least",
	AtMost: "at-most",
} as const

export type VisibilityQualifier = (typeof VisibilityQualifier)[keyof typeof VisibilityQualifier]

export interface Visibility {
	qualifier: VisibilityQualifier
	value: number
	unit: "mi"
}

export const CloudCover = {
	Clear: "SKC",
	ClearAutomated: "CLR",
	Few: "FEW",
	Scattered: "SCT",
	Broken: "BKN",
	Overcast: "OVC",
	VerticalVisibility: "VV",
} as const

export type CloudCover = (typeof CloudCover)[keyof typeof CloudCover]

export interface CloudLayer {
	/** Cover code as reported, or null for CAVOK */
	cover: CloudCover | null
	description: string
	/** Only reported for vertical visibility (indefinite ceiling) */
	altitudeFt: number | null
}

/**
 * Decoded surface observation. Every field is null when the report does not carry it.
 */
export interface WeatherObservation {
	readonly wind: Wind | null
	readonly visibility: Visibility | null
	/**
	 * Present weather phrases joined with " & ", e.g. "light rain showers & mist".
	 * Empty string when CAVOK rules out significant weather.
	 */
	readonly presentConditions: string | null
	/** Most recently reported layer only */
	readonly cloudLayer: CloudLayer | null
	readonly temperatureC: number | null
	readonly temperatureF: number | null
	readonly dewPointC: number | null
	readonly dewPointF: number | null
	readonly relativeHumidityPercent: number | null
	readonly heatIndexF: number | null
	readonly windChillF: number | null
	readonly pressureInHg: number | null
	readonly pressureHPa: number | null
}

export type ObservationDraft = { -readonly [K in keyof WeatherObservation]: WeatherObservation[K] }

export function emptyObservation(): ObservationDraft {
	return {
		wind: null,
		visibility: null,
		presentConditions: null,
		cloudLayer: null,
		temperatureC: null,
		temperatureF: null,
		dewPointC: null,
		dewPointF: null,
		relativeHumidityPercent: null,
		heatIndexF: null,
		windChillF: null,
		pressureInHg: null,
		pressureHPa: null,
	}
}
