export {
	decodeMetar,
	tokenizeReport,
	DecodeError,
	GROUP_SEQUENCE,
	type MetarDecodeResult,
} from "./decoder"

export {
	CompassPoint,
	CloudCover,
	VisibilityQualifier,
	WindDirection,
	type CloudLayer,
	type Visibility,
	type WeatherObservation,
	type Wind,
} from "./observation"

export { GroupKind, type GroupDecoder, type GroupStep, type ParseSession } from "./group"

export { WeatherCode, describeConditions } from "./conditions"
export { parseWind, compassPoint } from "./wind"
export { parseStatuteMiles } from "./visibility"
export { parseCloudLayer } from "./cloud-layer"
export { parsePressure, type Pressure } from "./altimeter"
export { heatIndex, relativeHumidity, windChill } from "./indices"

export {
	SpeedUnit,
	celsiusToFahrenheit,
	hPaToInHg,
	inHgToHPa,
	kmhToMph,
	knotsToMph,
	metersPerSecondToMph,
	metersToMiles,
	round,
	speedToMph,
} from "./units"
