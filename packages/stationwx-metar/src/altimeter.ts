import { GroupKind, Step, type GroupDecoder } from "./group"
import { hPaToInHg, inHgToHPa } from "./units"

// Annnn = nn.nn inches of mercury, Qnnnn = hectopascals
const ALTIMETER_PATTERN = /^([AQ])(\d{4})/

export interface Pressure {
	inHg: number
	hPa: number
}

/**
 * Parses an altimeter setting into both units. Returns null when the token is not one.
 */
export function parsePressure(token: string): Pressure | null {
	const match = ALTIMETER_PATTERN.exec(token)
	if (!match) {
		return null
	}

	const [, unit, digits = ""] = match
	if (unit === "A") {
		const inHg = Number(`${digits.slice(0, 2)}.${digits.slice(2)}`)
		return { inHg, hPa: inHgToHPa(inHg) }
	}

	const hPa = Number(digits)
	return { inHg: hPaToInHg(hPa), hPa }
}

export const altimeterGroup: GroupDecoder = {
	kind: GroupKind.Altimeter,
	decode(token, observation) {
		const pressure = parsePressure(token)
		if (!pressure) {
			return Step.absent
		}
		observation.pressureInHg = pressure.inHg
		observation.pressureHPa = pressure.hPa
		return Step.consumed
	},
}
