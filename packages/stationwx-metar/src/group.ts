import type { ObservationDraft } from "./observation"

export const GroupKind = {
	Time: "time",
	StationType: "station-type",
	Wind: "wind",
	VariableWind: "variable-wind",
	Visibility: "visibility",
	Runway: "runway",
	PresentConditions: "present-conditions",
	CloudLayer: "cloud-layer",
	Temperature: "temperature",
	Altimeter: "altimeter",
} as const

export type GroupKind = (typeof GroupKind)[keyof typeof GroupKind]

/**
 * Mutable state for a single decode call. Created fresh by the dispatcher and
 * discarded when it returns.
 */
export interface ParseSession {
	tokenCursor: number
	groupCursor: number
	/** Whole-mile part of a split visibility ("1 1/2SM"), waiting for its fraction */
	pendingWholeMile: string | null
	/** Present-weather phrases seen so far, in report order */
	conditions: string[]
}

export function createParseSession(): ParseSession {
	return {
		tokenCursor: 1,
		groupCursor: 0,
		pendingWholeMile: null,
		conditions: [],
	}
}

/**
 * What a group decoder did with the token it was offered.
 *
 * - `absent`: the token is not this kind of group; try the next kind on the same token.
 * - `consumed`: the token was this group; move on to the next token and the next kind.
 * - `repeat`: the token was this group and another one of the same kind may follow.
 * - `skip`: the token was consumed and the next `groups - 1` kinds are ruled out by it.
 */
export type GroupStep =
	| { readonly type: "absent" }
	| { readonly type: "consumed" }
	| { readonly type: "repeat" }
	| { readonly type: "skip"; readonly groups: number }

export const Step = {
	absent: { type: "absent" },
	consumed: { type: "consumed" },
	repeat: { type: "repeat" },
	skip: (groups: number): GroupStep => ({ type: "skip", groups }),
} as const satisfies Record<string, GroupStep | ((groups: number) => GroupStep)>

export interface GroupDecoder {
	readonly kind: GroupKind
	decode(token: string, observation: ObservationDraft, session: ParseSession): GroupStep
}
