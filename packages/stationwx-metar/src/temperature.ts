import { GroupKind, Step, type GroupDecoder } from "./group"
import { heatIndex, relativeHumidity, windChill } from "./indices"
import { celsiusToFahrenheit } from "./units"

// tt/dd, M for below zero; dew point may be missing or XX
const TEMPERATURE_PATTERN = /^(M?\d{2})\/(M?\d{2}|XX)?$/

function parseCelsius(text: string): number {
	const magnitude = Number(text.replace("M", ""))
	return text.startsWith("M") && magnitude !== 0 ? -magnitude : magnitude
}

export const temperatureGroup: GroupDecoder = {
	kind: GroupKind.Temperature,
	decode(token, observation) {
		const match = TEMPERATURE_PATTERN.exec(token)
		if (!match) {
			return Step.absent
		}

		const [, temperature = "", dewPoint] = match
		const temperatureC = parseCelsius(temperature)
		const temperatureF = celsiusToFahrenheit(temperatureC)
		observation.temperatureC = temperatureC
		observation.temperatureF = temperatureF
		observation.windChillF = windChill(temperatureF, observation.wind)

		if (dewPoint !== undefined && dewPoint !== "XX") {
			const dewPointC = parseCelsius(dewPoint)
			const humidity = relativeHumidity(temperatureC, dewPointC)
			observation.dewPointC = dewPointC
			observation.dewPointF = celsiusToFahrenheit(dewPointC)
			observation.relativeHumidityPercent = humidity
			observation.heatIndexF = heatIndex(temperatureF, humidity)
		}

		return Step.consumed
	},
}
