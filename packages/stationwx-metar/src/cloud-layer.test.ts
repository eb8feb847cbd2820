import { describe, expect, test } from "vitest"

import { cloudLayerGroup, parseCloudLayer } from "./cloud-layer"
import { createParseSession } from "./group"
import { emptyObservation } from "./observation"

describe("parseCloudLayer", () => {
	test("reads clear skies", () => {
		expect(parseCloudLayer("SKC")).toEqual({ cover: "SKC", description: "clear", altitudeFt: null })
		expect(parseCloudLayer("CLR")).toEqual({ cover: "CLR", description: "clear", altitudeFt: null })
	})

	test("describes layers without their altitude", () => {
		expect(parseCloudLayer("FEW250")).toEqual({
			cover: "FEW",
			description: "partly cloudy",
			altitudeFt: null,
		})
		expect(parseCloudLayer("BKN008CB")?.description).toBe("mostly cloudy")
	})

	test("reports vertical visibility in feet", () => {
		expect(parseCloudLayer("VV003")).toEqual({
			cover: "VV",
			description: "vertical visibility",
			altitudeFt: 300,
		})
	})

	test("rejects unknown layer codes", () => {
		expect(parseCloudLayer("XYZ010")).toBeNull()
		expect(parseCloudLayer("OVC")).toBeNull()
		expect(parseCloudLayer("A3010")).toBeNull()
	})
})

describe("cloudLayerGroup", () => {
	test("keeps only the last layer", () => {
		const observation = emptyObservation()
		const session = createParseSession()

		expect(cloudLayerGroup.decode("FEW020", observation, session)).toEqual({ type: "repeat" })
		expect(cloudLayerGroup.decode("BKN050", observation, session)).toEqual({ type: "repeat" })

		expect(observation.cloudLayer?.cover).toBe("BKN")
	})

	test("clear skies end the group", () => {
		expect(cloudLayerGroup.decode("CLR", emptyObservation(), createParseSession())).toEqual({
			type: "consumed",
		})
	})
})
