import { altimeterGroup } from "./altimeter"
import { cloudLayerGroup } from "./cloud-layer"
import { presentConditionsGroup } from "./conditions"
import { createParseSession, type GroupDecoder } from "./group"
import { runwayGroup, stationTypeGroup, timeGroup, variableWindGroup } from "./ignored-groups"
import { emptyObservation, type WeatherObservation } from "./observation"
import { temperatureGroup } from "./temperature"
import { visibilityGroup } from "./visibility"
import { windGroup } from "./wind"

export const DecodeError = {
	NoData: "NoData",
} as const

export type DecodeError = (typeof DecodeError)[keyof typeof DecodeError]

export type MetarDecodeResult =
	| { ok: true; observation: WeatherObservation }
	| { ok: false; error: DecodeError }

/**
 * Groups in the order they must appear in the body of a report.
 * The station identifier precedes them and is not decoded.
 */
export const GROUP_SEQUENCE: readonly GroupDecoder[] = Object.freeze([
	timeGroup,
	stationTypeGroup,
	windGroup,
	variableWindGroup,
	visibilityGroup,
	runwayGroup,
	presentConditionsGroup,
	cloudLayerGroup,
	temperatureGroup,
	altimeterGroup,
])

/**
 * Splits a raw report into its whitespace-delimited groups.
 */
export function tokenizeReport(raw: string): readonly string[] {
	const trimmed = raw.trim()
	if (trimmed === "") {
		return []
	}
	return Object.freeze(trimmed.split(/\s+/))
}

/**
 * Decodes a raw METAR body, e.g.
 * `"KTIK 191753Z AUTO 04009KT 10SM OVC037 01/M04 A3010 RMK AO2"`.
 *
 * Groups are matched in their fixed order; a group that is missing or not
 * understood is skipped without error. Decoding stops after the altimeter
 * group, so remarks are never read.
 *
 * @example
 * ```ts
 * const result = decodeMetar(raw)
 * if (result.ok) {
 *   console.log(result.observation.temperatureF)
 * }
 * ```
 */
export function decodeMetar(raw: string): MetarDecodeResult {
	const tokens = tokenizeReport(raw)
	if (tokens.length === 0) {
		return { ok: false, error: DecodeError.NoData }
	}

	const observation = emptyObservation()
	const session = createParseSession()

	while (session.groupCursor < GROUP_SEQUENCE.length && session.tokenCursor < tokens.length) {
		const group = GROUP_SEQUENCE[session.groupCursor]
		const token = tokens[session.tokenCursor]
		if (!group || token === undefined) {
			break
		}

		const step = group.decode(token, observation, session)
		switch (step.type) {
			case "absent":
				session.groupCursor++
				break
			case "consumed":
				session.tokenCursor++
				session.groupCursor++
				break
			case "repeat":
				session.tokenCursor++
				break
			case "skip":
				session.tokenCursor++
				session.groupCursor += step.groups
				break
		}
	}

	return { ok: true, observation: Object.freeze(observation) }
}
