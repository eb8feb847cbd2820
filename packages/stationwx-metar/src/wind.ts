import { GroupKind, Step, type GroupDecoder } from "./group"
import { CompassPoint, WindDirection, type Wind } from "./observation"
import { SpeedUnit, speedToMph } from "./units"

// dddss(Ggg)KT, VRBss(Ggg)MPS, 00000KMH ...
const WIND_PATTERN = /^(\d{3}|VRB)(\d{2,3})(?:G(\d{2,3}))?(KT|MPS|KMH)$/

const CALM = "00000"

function toSpeedUnit(unit: string | undefined): SpeedUnit | null {
	switch (unit) {
		case SpeedUnit.Knots:
		case SpeedUnit.MetersPerSecond:
		case SpeedUnit.KilometersPerHour:
			return unit
		default:
			return null
	}
}

export function compassPoint(degrees: number): CompassPoint {
	const index = Math.round(degrees / 22.5) % CompassPoint.length
	return CompassPoint[index] ?? "N"
}

/**
 * Parses a wind group. Returns null when the token is not one.
 */
export function parseWind(token: string): Wind | null {
	const match = WIND_PATTERN.exec(token)
	if (!match) {
		return null
	}

	const [, direction = "", speed = "", gust, unit] = match
	const speedUnit = toSpeedUnit(unit)
	if (!speedUnit) {
		return null
	}

	if (`${direction}${speed}` === CALM) {
		return { direction: WindDirection.Calm, speedMph: null, gustMph: null }
	}

	return {
		direction: direction === "VRB" ? WindDirection.Varies : compassPoint(Number(direction)),
		speedMph: speedToMph(Number(speed), speedUnit),
		gustMph: gust === undefined ? null : speedToMph(Number(gust), speedUnit),
	}
}

export const windGroup: GroupDecoder = {
	kind: GroupKind.Wind,
	decode(token, observation) {
		const wind = parseWind(token)
		if (!wind) {
			return Step.absent
		}
		observation.wind = wind
		return Step.consumed
	},
}
