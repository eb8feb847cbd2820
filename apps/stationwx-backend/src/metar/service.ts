import {
	DefaultAviationWeatherClient,
	MetarSource,
	type AviationWeatherClient,
	type MetarFeedItem,
} from "@stationwx/source-metar"

export interface MetarServiceOptions {
	client?: AviationWeatherClient
	/** Used to build the default client when `client` is not given */
	baseUrl?: string
	timeoutMs?: number
}

/**
 * Decodes the latest observation for any station through one shared client.
 */
export class MetarService {
	private readonly client: AviationWeatherClient

	constructor(options: MetarServiceOptions = {}) {
		this.client =
			options.client ??
			new DefaultAviationWeatherClient({ baseUrl: options.baseUrl, timeoutMs: options.timeoutMs })
	}

	/**
	 * A MetarSource for a station, backed by the shared client.
	 */
	sourceForStation(station: string): MetarSource {
		return new MetarSource({ station, client: this.client })
	}

	/**
	 * The decoded latest observation for a station, or null when its report is empty.
	 */
	async latestObservation(station: string, now: Date): Promise<MetarFeedItem | null> {
		const [item] = await this.sourceForStation(station).fetchItems({ time: now })
		return item ?? null
	}
}
