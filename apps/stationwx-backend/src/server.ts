import { Hono } from "hono"

import type { Config } from "./config.ts"

import { registerMetarHttpHandlers } from "./metar/http.ts"
import { MetarService } from "./metar/service.ts"

export function createApp(config: Config, metarService?: MetarService) {
	const app = new Hono()

	app.get("/health", (c) => c.json({ status: "ok" }))

	registerMetarHttpHandlers(app, {
		metarService:
			metarService ??
			new MetarService({
				baseUrl: config.aviationWeatherBaseUrl,
				timeoutMs: config.metarTimeoutMs,
			}),
		displayTimeZone: config.displayTimeZone,
	})

	return app
}
