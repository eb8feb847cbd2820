import type { CloudLayer, Visibility, VisibilityQualifier, Wind } from "@stationwx/metar"
import type { MetarObservationData } from "@stationwx/source-metar"

const DEFAULT_WIDTH = 30
const MIN_PADDING = 2

const QUALIFIER_GLYPH: Record<VisibilityQualifier, string> = {
	exact: "",
	"at-least": ">",
	"at-most": "<",
}

export interface FormatOptions {
	/** Characters per line, label and value included */
	width?: number
	timeZone?: string
}

export function formatAge(minutes: number): string {
	if (minutes < 91) {
		return `${minutes} min`
	}
	const remainder = String(minutes % 60).padStart(2, "0")
	return `${Math.floor(minutes / 60)}:${remainder} hr`
}

export function formatTemperature(fahrenheit: number): string {
	return `${fahrenheit}°F`
}

export function formatWind(wind: Wind): string {
	if (wind.speedMph === null) {
		return wind.direction
	}
	const gust = wind.gustMph === null ? "" : `/${wind.gustMph}`
	return `${wind.direction} ${wind.speedMph}${gust} mph`
}

export function formatVisibility(visibility: Visibility): string {
	return `${QUALIFIER_GLYPH[visibility.qualifier]}${visibility.value} ${visibility.unit}`
}

export function formatSky(layer: CloudLayer): string {
	return layer.altitudeFt === null ? layer.description : `${layer.cover} ${layer.altitudeFt} ft`
}

export function formatPressure(inHg: number): string {
	return `${inHg.toFixed(2)} in`
}

/**
 * "Mon Jan 19, 17:53 UTC"
 */
export function formatObservedAt(observedAt: Date, timeZone = "UTC"): string {
	const parts = new Intl.DateTimeFormat("en-US", {
		timeZone,
		weekday: "short",
		month: "short",
		day: "numeric",
		hour: "2-digit",
		minute: "2-digit",
		hourCycle: "h23",
		timeZoneName: "short",
	}).formatToParts(observedAt)

	const part = (type: Intl.DateTimeFormatPartTypes) =>
		parts.find((p) => p.type === type)?.value ?? ""

	return `${part("weekday")} ${part("month")} ${part("day")}, ${part("hour")}:${part("minute")} ${part("timeZoneName")}`
}

/**
 * Pads label and value with dots to a fixed width: "Humidity..............70%".
 */
export function formatLine(label: string, value: string, width = DEFAULT_WIDTH): string {
	const padding = width - label.length - value.length
	return `${label}${".".repeat(padding > 0 ? padding : MIN_PADDING)}${value}`
}

function optional<T>(value: T | null, format: (value: T) => string): string {
	return value === null ? "" : format(value)
}

/**
 * Renders a decoded report as monospaced "label......value" lines. Values that
 * were not reported are left out.
 */
export function formatReport(report: MetarObservationData, options: FormatOptions = {}): string[] {
	const width = options.width ?? DEFAULT_WIDTH
	const { observation } = report

	const rows: Array<[string, string]> = [
		["Age", formatAge(report.ageMinutes)],
		["Temperature", optional(observation.temperatureF, formatTemperature)],
		["Wind Chill", optional(observation.windChillF, formatTemperature)],
		["Heat Index", optional(observation.heatIndexF, formatTemperature)],
		["Dew Point", optional(observation.dewPointF, formatTemperature)],
		["Humidity", optional(observation.relativeHumidityPercent, (rh) => `${rh}%`)],
		["Pressure", optional(observation.pressureInHg, formatPressure)],
		["Wind", optional(observation.wind, formatWind)],
		["Visibility", optional(observation.visibility, formatVisibility)],
		["Sky", optional(observation.cloudLayer, formatSky)],
		["Wx", observation.presentConditions ?? ""],
	]

	return [
		`Weather @ ${report.station}`,
		`Observed ${formatObservedAt(report.observedAt, options.timeZone)}`,
		...rows.filter(([, value]) => value.trim() !== "").map(([label, value]) => formatLine(label, value, width)),
	]
}
