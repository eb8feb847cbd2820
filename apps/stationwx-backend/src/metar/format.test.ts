import type { MetarObservationData } from "@stationwx/source-metar"

import { decodeMetar } from "@stationwx/metar"
import { describe, expect, test } from "vitest"

import {
	formatAge,
	formatLine,
	formatObservedAt,
	formatReport,
	formatSky,
	formatVisibility,
	formatWind,
} from "./format.ts"

const OBSERVED_AT = new Date("2026-01-19T17:53:00Z")

function reportFor(rawText: string, ageMinutes = 12): MetarObservationData {
	const result = decodeMetar(rawText)
	if (!result.ok) {
		throw new Error("expected a decodable report")
	}
	return { station: "KTIK", rawText, observedAt: OBSERVED_AT, ageMinutes, observation: result.observation }
}

describe("formatAge", () => {
	test("uses minutes up to 90", () => {
		expect(formatAge(0)).toBe("0 min")
		expect(formatAge(90)).toBe("90 min")
	})

	test("uses hours and minutes beyond 90", () => {
		expect(formatAge(91)).toBe("1:31 hr")
		expect(formatAge(185)).toBe("3:05 hr")
	})
})

describe("formatWind", () => {
	test("formats direction, speed and gust", () => {
		expect(formatWind({ direction: "NE", speedMph: 10, gustMph: null })).toBe("NE 10 mph")
		expect(formatWind({ direction: "W", speedMph: 17, gustMph: 29 })).toBe("W 17/29 mph")
		expect(formatWind({ direction: "varies", speedMph: 6, gustMph: null })).toBe("varies 6 mph")
	})

	test("formats calm", () => {
		expect(formatWind({ direction: "calm", speedMph: null, gustMph: null })).toBe("calm")
	})
})

describe("formatVisibility", () => {
	test("adds a glyph for bounded values", () => {
		expect(formatVisibility({ qualifier: "exact", value: 10, unit: "mi" })).toBe("10 mi")
		expect(formatVisibility({ qualifier: "at-least", value: 7, unit: "mi" })).toBe(">7 mi")
		expect(formatVisibility({ qualifier: "at-most", value: 0.25, unit: "mi" })).toBe("<0.25 mi")
	})
})

describe("formatSky", () => {
	test("shows vertical visibility with its height", () => {
		expect(formatSky({ cover: "VV", description: "vertical visibility", altitudeFt: 300 })).toBe(
			"VV 300 ft",
		)
		expect(formatSky({ cover: "OVC", description: "overcast", altitudeFt: null })).toBe("overcast")
	})
})

describe("formatObservedAt", () => {
	test("formats in the given zone", () => {
		expect(formatObservedAt(OBSERVED_AT)).toBe("Mon Jan 19, 17:53 UTC")
		expect(formatObservedAt(OBSERVED_AT, "America/Chicago")).toBe("Mon Jan 19, 11:53 CST")
	})
})

describe("formatLine", () => {
	test("pads with dots to the width", () => {
		expect(formatLine("Humidity", "70%")).toBe(`Humidity${".".repeat(19)}70%`)
		expect(formatLine("Sky", "clear", 12)).toBe("Sky....clear")
	})

	test("keeps two dots when the value is too long", () => {
		expect(formatLine("Wx", "heavy thunderstorm rain & mist", 20)).toBe(
			"Wx..heavy thunderstorm rain & mist",
		)
	})
})

describe("formatReport", () => {
	test("lists reported values in display order", () => {
		const lines = formatReport(reportFor("KTIK 191753Z AUTO 04009KT 10SM OVC037 01/M04 A3010"))

		expect(lines).toEqual([
			"Weather @ KTIK",
			"Observed Mon Jan 19, 17:53 UTC",
			`Age${".".repeat(21)}12 min`,
			`Temperature${".".repeat(15)}34°F`,
			`Wind Chill${".".repeat(16)}26°F`,
			`Dew Point${".".repeat(17)}25°F`,
			`Humidity${".".repeat(19)}70%`,
			`Pressure${".".repeat(14)}30.10 in`,
			`Wind${".".repeat(17)}NE 10 mph`,
			`Visibility${".".repeat(15)}10 mi`,
			`Sky${".".repeat(19)}overcast`,
		])
	})

	test("includes weather and heat index when reported", () => {
		const lines = formatReport(
			reportFor("KDFW 191753Z 18012KT 3SM -RA FEW250 30/22 A2992", 120),
			{ width: 24 },
		)

		expect(lines).toContain(`Age${".".repeat(14)}2:00 hr`)
		expect(lines).toContain(`Heat Index${".".repeat(10)}92°F`)
		expect(lines).toContain(`Wx${".".repeat(12)}light rain`)
		expect(lines.some((line) => line.startsWith("Wind Chill"))).toBe(false)
	})

	test("leaves out empty weather after CAVOK", () => {
		const lines = formatReport(reportFor("EGLL 191750Z 24012KT CAVOK 18/09 Q1018"))

		expect(lines).toContain(`Visibility${".".repeat(15)}>7 mi`)
		expect(lines).toContain(`Sky${".".repeat(16)}clear skies`)
		expect(lines.some((line) => line.startsWith("Wx"))).toBe(false)
	})
})
