import { GroupKind, Step, type GroupDecoder } from "./group"

/** Present weather codes, per the Federal Meteorological Handbook No. 1 §12.6.8 */
export const WeatherCode: Readonly<Record<string, string>> = Object.freeze({
	// proximity
	VC: "nearby",
	// descriptors
	MI: "shallow",
	PR: "partial",
	BC: "patches of",
	DR: "low drifting",
	BL: "blowing",
	SH: "showers",
	TS: "thunderstorm",
	FZ: "freezing",
	// precipitation
	DZ: "drizzle",
	RA: "rain",
	SN: "snow",
	SG: "snow grains",
	IC: "ice crystals",
	PE: "ice pellets",
	PL: "ice pellets",
	GR: "hail",
	GS: "small hail",
	UP: "unknown",
	// obscuration
	BR: "mist",
	FG: "fog",
	FU: "smoke",
	VA: "volcanic ash",
	DU: "widespread dust",
	SA: "sand",
	HZ: "haze",
	PY: "spray",
	// other
	PO: "dust whirls",
	SQ: "squalls",
	FC: "tornado",
	SS: "duststorm",
	DS: "duststorm",
})

const Intensity: Readonly<Record<string, string>> = Object.freeze({
	"-": "light",
	"+": "heavy",
	VC: "nearby",
})

const SHOWERS = "SH"

const CONDITIONS_PATTERN = new RegExp(
	`^([-+]|VC)?((?:${Object.keys(WeatherCode)
		.filter((code) => code !== "VC")
		.join("|")})+)$`,
)

function splitCodes(codes: string): string[] {
	const pairs: string[] = []
	for (let i = 0; i < codes.length; i += 2) {
		pairs.push(codes.slice(i, i + 2))
	}
	return pairs
}

/**
 * Translates one present-weather group, e.g. "-SHRA" → "light rain showers".
 * Returns null when the token is not a present-weather group.
 */
export function describeConditions(token: string): string | null {
	const match = CONDITIONS_PATTERN.exec(token)
	if (!match) {
		return null
	}

	const [, prefix, codes = ""] = match
	const pairs = splitCodes(codes)

	// "SHRA" reads as "rain showers"
	const [first, second, ...rest] = pairs
	const ordered = first === SHOWERS && second !== undefined ? [second, first, ...rest] : pairs

	const words = ordered.map((code) => WeatherCode[code] ?? code)
	const intensity = prefix === undefined ? undefined : Intensity[prefix]
	return (intensity ? [intensity, ...words] : words).join(" ")
}

export const presentConditionsGroup: GroupDecoder = {
	kind: GroupKind.PresentConditions,
	decode(token, observation, session) {
		const phrase = describeConditions(token)
		if (phrase === null) {
			return Step.absent
		}
		session.conditions.push(phrase)
		observation.presentConditions = session.conditions.join(" & ")
		return Step.repeat
	},
}
