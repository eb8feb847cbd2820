import { describe, expect, test } from "vitest"

import { createParseSession } from "./group"
import { emptyObservation } from "./observation"
import { compassPoint, parseWind, windGroup } from "./wind"

describe("compassPoint", () => {
	test("maps degrees onto sixteen points", () => {
		expect(compassPoint(0)).toBe("N")
		expect(compassPoint(40)).toBe("NE")
		expect(compassPoint(180)).toBe("S")
		expect(compassPoint(225)).toBe("SW")
		expect(compassPoint(270)).toBe("W")
		expect(compassPoint(350)).toBe("N")
		expect(compassPoint(360)).toBe("N")
	})
})

describe("parseWind", () => {
	test("converts knots to whole miles per hour", () => {
		expect(parseWind("04009KT")).toEqual({ direction: "NE", speedMph: 10, gustMph: null })
	})

	test("reads a gust", () => {
		expect(parseWind("27015G25KT")).toEqual({ direction: "W", speedMph: 17, gustMph: 29 })
	})

	test("reads three-digit speeds", () => {
		expect(parseWind("180100G120KT")).toEqual({ direction: "S", speedMph: 115, gustMph: 138 })
	})

	test("converts metres per second and kilometres per hour", () => {
		expect(parseWind("09004MPS")?.speedMph).toBe(9)
		expect(parseWind("09036KMH")?.speedMph).toBe(22)
	})

	test("reports variable direction as varies", () => {
		expect(parseWind("VRB03KT")).toEqual({ direction: "varies", speedMph: 3, gustMph: null })
	})

	test("reports 00000 as calm in any unit", () => {
		const calm = { direction: "calm", speedMph: null, gustMph: null }
		expect(parseWind("00000KT")).toEqual(calm)
		expect(parseWind("00000MPS")).toEqual(calm)
	})

	test("rejects tokens that are not wind groups", () => {
		expect(parseWind("10SM")).toBeNull()
		expect(parseWind("04009")).toBeNull()
		expect(parseWind("04009MPH")).toBeNull()
		expect(parseWind("200V280")).toBeNull()
	})
})

describe("windGroup", () => {
	test("consumes a wind token", () => {
		const observation = emptyObservation()
		const step = windGroup.decode("36010KT", observation, createParseSession())

		expect(step).toEqual({ type: "consumed" })
		expect(observation.wind?.direction).toBe("N")
	})

	test("leaves the observation alone when absent", () => {
		const observation = emptyObservation()
		const step = windGroup.decode("10SM", observation, createParseSession())

		expect(step).toEqual({ type: "absent" })
		expect(observation.wind).toBeNull()
	})
})
