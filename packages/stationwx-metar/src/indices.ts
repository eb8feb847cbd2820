import type { Wind } from "./observation"

import { round } from "./units"

/**
 * Relative humidity (%) from air temperature and dew point in Celsius.
 */
export function relativeHumidity(temperatureC: number, dewPointC: number): number {
	const ratio = (112 - 0.1 * temperatureC + dewPointC) / (112 + 0.9 * temperatureC)
	return round(100 * ratio ** 8)
}

/**
 * Heat index (°F) using the Rothfusz regression. Null outside the range
 * where the index applies: above 79 °F and above 39 % humidity.
 */
export function heatIndex(temperatureF: number, humidityPercent: number): number | null {
	if (temperatureF <= 79 || humidityPercent <= 39) {
		return null
	}

	const t = temperatureF
	const rh = humidityPercent
	const index =
		-42.379 +
		2.04901523 * t +
		10.14333127 * rh -
		0.22475541 * t * rh -
		0.00683783 * t ** 2 -
		0.05481717 * rh ** 2 +
		0.00122874 * t ** 2 * rh +
		0.00085282 * t * rh ** 2 -
		0.00000199 * t ** 2 * rh ** 2

	return round(index)
}

/**
 * Wind chill (°F) from temperature and sustained wind. Gusts are ignored.
 * Null when it is 51 °F or warmer, calm, or the wind is 3 mph or less.
 */
export function windChill(temperatureF: number, wind: Wind | null): number | null {
	if (temperatureF >= 51 || !wind || wind.speedMph === null || wind.speedMph <= 3) {
		return null
	}

	const v = wind.speedMph ** 0.16
	return round(35.74 + 0.6215 * temperatureF - 35.75 * v + 0.4275 * temperatureF * v)
}
