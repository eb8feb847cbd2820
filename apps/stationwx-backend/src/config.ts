import { AVIATIONWEATHER_API_BASE } from "@stationwx/source-metar"
import { type } from "arktype"

import { ConfigError } from "./lib/error.ts"

export interface Config {
	port: number
	aviationWeatherBaseUrl: string
	metarTimeoutMs: number
	/** IANA zone used when printing observation times */
	displayTimeZone: string
}

const DEFAULT_PORT = 3000
const DEFAULT_METAR_TIMEOUT_MS = 2000
const DEFAULT_DISPLAY_TIME_ZONE = "UTC"

function isTimeZone(timeZone: string): boolean {
	try {
		new Intl.DateTimeFormat("en-US", { timeZone })
		return true
	} catch {
		return false
	}
}

const positiveInteger = type("string.integer.parse").to("number > 0")

const envSchema = type({
	"PORT?": positiveInteger,
	"AVIATIONWEATHER_BASE_URL?": "string.url",
	"METAR_TIMEOUT_MS?": positiveInteger,
	"DISPLAY_TIME_ZONE?": type("string").narrow(
		(timeZone, ctx) => isTimeZone(timeZone) || ctx.mustBe("a valid IANA time zone"),
	),
})

/**
 * Reads configuration from environment variables, applying defaults.
 * Throws ConfigError when a variable is set to an invalid value.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
	const result = envSchema(env)
	if (result instanceof type.errors) {
		throw new ConfigError(result.summary)
	}

	return {
		port: result.PORT ?? DEFAULT_PORT,
		aviationWeatherBaseUrl: result.AVIATIONWEATHER_BASE_URL ?? AVIATIONWEATHER_API_BASE,
		metarTimeoutMs: result.METAR_TIMEOUT_MS ?? DEFAULT_METAR_TIMEOUT_MS,
		displayTimeZone: result.DISPLAY_TIME_ZONE ?? DEFAULT_DISPLAY_TIME_ZONE,
	}
}
