import { GroupKind, Step, type GroupDecoder } from "./group"

// These groups are consumed positionally and carry nothing into the observation.
// The observation instant comes from whoever retrieved the report, not from ddhhmmZ.

export const timeGroup: GroupDecoder = {
	kind: GroupKind.Time,
	decode(token) {
		return token.endsWith("Z") ? Step.consumed : Step.absent
	},
}

export const stationTypeGroup: GroupDecoder = {
	kind: GroupKind.StationType,
	decode(token) {
		return token === "AUTO" || token === "COR" ? Step.consumed : Step.absent
	},
}

const VARIABLE_WIND_PATTERN = /^\d{3}V\d{3}$/

export const variableWindGroup: GroupDecoder = {
	kind: GroupKind.VariableWind,
	decode(token) {
		return VARIABLE_WIND_PATTERN.test(token) ? Step.consumed : Step.absent
	},
}

const RUNWAY_PATTERN = /^R\d{1,3}/

/** Runway visual range, e.g. R06/1000 or R28L/2600FT. Repeats once per runway. */
export const runwayGroup: GroupDecoder = {
	kind: GroupKind.Runway,
	decode(token) {
		return RUNWAY_PATTERN.test(token) ? Step.repeat : Step.absent
	},
}
