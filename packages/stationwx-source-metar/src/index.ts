export { MetarKey, type MetarReport } from "./metar-context"
export {
	MetarSource,
	observationAgeMinutes,
	signalsForObservation,
	type MetarSourceOptions,
} from "./metar-source"

export {
	MetarFeedItemType,
	type MetarFeedItem,
	type MetarObservationData,
} from "./feed-items"

export {
	AVIATIONWEATHER_API_BASE,
	DefaultAviationWeatherClient,
	normalizeStation,
	type AviationWeatherClient,
	type AviationWeatherClientOptions,
	type StationReport,
} from "./aviationweather"

export { InvalidStationError, MetarFetchError, StationNotFoundError } from "./errors"
