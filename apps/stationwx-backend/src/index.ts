import { serve } from "@hono/node-server"

import { loadConfig } from "./config.ts"
import { createApp } from "./server.ts"

function main() {
	const config = loadConfig()
	const app = createApp(config)

	serve({ fetch: app.fetch, port: config.port }, (info) => {
		console.log(`[stationwx.backend] listening on http://localhost:${info.port}`)
	})
}

main()
