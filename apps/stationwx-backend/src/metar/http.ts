import type { Context, Hono } from "hono"

import { DecodeError, decodeMetar } from "@stationwx/metar"
import { InvalidStationError, MetarFetchError, StationNotFoundError } from "@stationwx/source-metar"
import { type } from "arktype"
import { createMiddleware } from "hono/factory"

import type { MetarService } from "./service.ts"

import { formatReport } from "./format.ts"

type Env = { Variables: { metarService: MetarService } }

interface MetarHttpHandlersDeps {
	metarService: MetarService
	displayTimeZone?: string
	/** Clock used for observation age */
	now?: () => Date
}

const decodeRequest = type({ raw: "string" })

export function registerMetarHttpHandlers(
	app: Hono,
	{ metarService, displayTimeZone, now = () => new Date() }: MetarHttpHandlersDeps,
) {
	const inject = createMiddleware<Env>(async (c, next) => {
		c.set("metarService", metarService)
		await next()
	})

	app.post("/api/metar/decode", handleDecode)

	app.get("/api/metar/:station", inject, async (c) => {
		try {
			const item = await c.get("metarService").latestObservation(c.req.param("station"), now())
			if (!item) {
				return c.json({ error: DecodeError.NoData }, 404)
			}
			return c.json({ ...item.data, signals: item.signals })
		} catch (error) {
			return errorResponse(c, error)
		}
	})

	app.get("/api/metar/:station/text", inject, async (c) => {
		try {
			const item = await c.get("metarService").latestObservation(c.req.param("station"), now())
			if (!item) {
				return c.text(`${DecodeError.NoData}\n`, 404)
			}
			const lines = formatReport(item.data, { timeZone: displayTimeZone })
			return c.text(`${lines.join("\n")}\n`)
		} catch (error) {
			return errorResponse(c, error)
		}
	})
}

async function handleDecode(c: Context) {
	let body: unknown
	try {
		body = await c.req.json()
	} catch {
		return c.json({ error: "Request body must be JSON" }, 400)
	}

	const request = decodeRequest(body)
	if (request instanceof type.errors) {
		return c.json({ error: request.summary }, 400)
	}

	const result = decodeMetar(request.raw)
	if (!result.ok) {
		return c.json({ error: result.error }, 422)
	}
	return c.json({ observation: result.observation })
}

function errorResponse(c: Context, error: unknown) {
	if (error instanceof InvalidStationError) {
		return c.json({ error: error.message }, 400)
	}
	if (error instanceof StationNotFoundError) {
		return c.json({ error: error.message }, 404)
	}
	if (error instanceof MetarFetchError) {
		console.error(`[stationwx.backend] ${error.message}`, error.cause ?? "")
		return c.json({ error: error.message }, 502)
	}
	throw error
}
