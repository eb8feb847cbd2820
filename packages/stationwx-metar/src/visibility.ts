import { GroupKind, Step, type GroupDecoder, type ParseSession } from "./group"
import {
	VisibilityQualifier,
	type ObservationDraft,
	type Visibility,
} from "./observation"
import { metersToMiles } from "./units"

const CAVOK = "CAVOK"
const CAVOK_MILES = 7
/** Visibility, runway, present conditions and cloud layer are all settled by CAVOK */
const CAVOK_GROUPS = 4

const WHOLE_MILE_PATTERN = /^\d$/
const MILES_PATTERN = /^(\d+)(?:\/(\d+))?$/
const METERS_PATTERN = /^\d{4}$/

/**
 * Reads "10", "3/4" or "1 1/2" as statute miles.
 */
export function parseStatuteMiles(text: string): number | null {
	let total = 0
	for (const part of text.split(" ")) {
		const match = MILES_PATTERN.exec(part)
		if (!match) {
			return null
		}
		const [, numerator = "", denominator] = match
		if (denominator === undefined) {
			total += Number(numerator)
		} else if (Number(denominator) === 0) {
			return null
		} else {
			total += Number(numerator) / Number(denominator)
		}
	}
	return total
}

function parseStatuteMileGroup(token: string, pendingWholeMile: string | null): Visibility | null {
	let body = token.slice(0, -2)
	let qualifier: VisibilityQualifier = VisibilityQualifier.Exact
	if (body.startsWith("M")) {
		qualifier = VisibilityQualifier.AtMost
		body = body.slice(1)
	} else if (body.startsWith("P")) {
		qualifier = VisibilityQualifier.AtLeast
		body = body.slice(1)
	}

	const miles = parseStatuteMiles(pendingWholeMile ? `${pendingWholeMile} ${body}` : body)
	if (miles === null) {
		return null
	}
	return { qualifier, value: miles, unit: "mi" }
}

function applyCavok(observation: ObservationDraft, session: ParseSession): void {
	observation.visibility = { qualifier: VisibilityQualifier.AtLeast, value: CAVOK_MILES, unit: "mi" }
	observation.presentConditions = ""
	observation.cloudLayer = { cover: null, description: "clear skies", altitudeFt: null }
	session.conditions = []
}

export const visibilityGroup: GroupDecoder = {
	kind: GroupKind.Visibility,
	decode(token, observation, session) {
		if (token === CAVOK) {
			session.pendingWholeMile = null
			applyCavok(observation, session)
			return Step.skip(CAVOK_GROUPS)
		}

		if (WHOLE_MILE_PATTERN.test(token)) {
			session.pendingWholeMile = token
			return Step.repeat
		}

		if (token.endsWith("SM")) {
			const visibility = parseStatuteMileGroup(token, session.pendingWholeMile)
			session.pendingWholeMile = null
			if (!visibility) {
				return Step.absent
			}
			observation.visibility = visibility
			return Step.consumed
		}

		// Kilometre visibilities are recognised but not converted.
		if (token.endsWith("KM")) {
			session.pendingWholeMile = null
			return Step.consumed
		}

		if (METERS_PATTERN.test(token)) {
			observation.visibility = {
				qualifier: VisibilityQualifier.Exact,
				value: metersToMiles(Number(token)),
				unit: "mi",
			}
			return Step.consumed
		}

		return Step.absent
	},
}
