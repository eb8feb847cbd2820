import type { AviationWeatherClient, StationReport } from "@stationwx/source-metar"

import { InvalidStationError } from "@stationwx/source-metar"
import { afterEach, describe, expect, test, vi } from "vitest"

import { MetarService } from "./service.ts"

const OBSERVED_AT = new Date("2026-01-19T17:53:00Z")
const NOW = new Date("2026-01-19T18:05:30Z")

function createMockClient(rawText: string): AviationWeatherClient {
	return {
		fetchLatest: async (station: string): Promise<StationReport> => ({
			station,
			rawText,
			observedAt: OBSERVED_AT,
		}),
	}
}

afterEach(() => {
	vi.unstubAllGlobals()
})

describe("MetarService", () => {
	test("sourceForStation normalizes the station", () => {
		const service = new MetarService({ client: createMockClient("") })

		expect(service.sourceForStation(" ktik ").station).toBe("KTIK")
	})

	test("sourceForStation rejects an invalid station", () => {
		const service = new MetarService({ client: createMockClient("") })

		expect(() => service.sourceForStation("K-TIK")).toThrow(InvalidStationError)
	})

	test("shares one client across stations", async () => {
		const fetchLatest = vi.fn(
			async (station: string): Promise<StationReport> => ({
				station,
				rawText: `${station} 191753Z 04009KT 10SM OVC037 01/M04 A3010`,
				observedAt: OBSERVED_AT,
			}),
		)
		const service = new MetarService({ client: { fetchLatest } })

		await service.latestObservation("KTIK", NOW)
		await service.latestObservation("KOKC", NOW)
		await service.latestObservation("ktik", NOW)

		expect(fetchLatest.mock.calls.map(([station]) => station)).toEqual(["KTIK", "KOKC", "KTIK"])
	})

	test("builds the default client from baseUrl", async () => {
		const fetchMock = vi.fn(
			async (_input: string) =>
				new Response(
					JSON.stringify([
						{ icaoId: "KTIK", obsTime: 1768845180, rawOb: "KTIK 191753Z 04009KT 10SM OVC037 01/M04 A3010" },
					]),
					{ status: 200, headers: { "Content-Type": "application/json" } },
				),
		)
		vi.stubGlobal("fetch", fetchMock)
		const service = new MetarService({ baseUrl: "https://wx.test" })

		const item = await service.latestObservation("KTIK", NOW)

		expect(fetchMock.mock.calls[0]?.[0]).toBe("https://wx.test/api/data/metar?ids=KTIK&format=json")
		expect(item?.data.ageMinutes).toBe(12)
	})

	test("latestObservation returns the decoded observation item", async () => {
		const service = new MetarService({
			client: createMockClient("KTIK 191753Z AUTO 04009KT 10SM OVC037 01/M04 A3010"),
		})

		const item = await service.latestObservation("KTIK", NOW)

		expect(item?.data.station).toBe("KTIK")
		expect(item?.data.ageMinutes).toBe(12)
		expect(item?.data.observation.temperatureF).toBe(34)
		expect(item?.signals).toEqual({ urgency: 0.3, timeRelevance: "ambient" })
	})

	test("latestObservation returns null for a report with no data", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
		const service = new MetarService({ client: createMockClient("   ") })

		const item = await service.latestObservation("KTIK", NOW)

		expect(item).toBeNull()
		expect(warn).toHaveBeenCalledWith("[stationwx.metar] KTIK: report has no data")
		warn.mockRestore()
	})
})
