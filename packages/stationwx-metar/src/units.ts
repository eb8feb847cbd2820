// 1 mph = 0.868976 kt = 1.609344 km/h = 0.44704 m/s
const MPH_PER_KNOT = 1.1508
const MPH_PER_METER_PER_SECOND = 2.23694
const MPH_PER_KMH = 0.621371

const METERS_PER_VISIBILITY_MILE = 621.4
const IN_HG_PER_HPA = 0.02953

export const SpeedUnit = {
	Knots: "KT",
	MetersPerSecond: "MPS",
	KilometersPerHour: "KMH",
} as const

export type SpeedUnit = (typeof SpeedUnit)[keyof typeof SpeedUnit]

/**
 * Rounds half away from zero, to `digits` decimal places.
 */
export function round(value: number, digits = 0): number {
	const factor = 10 ** digits
	const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor
	return rounded === 0 ? 0 : rounded
}

export function knotsToMph(knots: number): number {
	return round(knots * MPH_PER_KNOT)
}

export function metersPerSecondToMph(mps: number): number {
	return round(mps * MPH_PER_METER_PER_SECOND)
}

export function kmhToMph(kmh: number): number {
	return round(kmh * MPH_PER_KMH)
}

/** Whole miles per hour for a reported wind speed. */
export function speedToMph(speed: number, unit: SpeedUnit): number {
	switch (unit) {
		case SpeedUnit.Knots:
			return knotsToMph(speed)
		case SpeedUnit.MetersPerSecond:
			return metersPerSecondToMph(speed)
		case SpeedUnit.KilometersPerHour:
			return kmhToMph(speed)
	}
}

/**
 * Statute miles for a visibility in meters: tenths up to 5 miles, whole miles beyond.
 */
export function metersToMiles(meters: number): number {
	const miles = round(meters / METERS_PER_VISIBILITY_MILE, 1)
	return miles > 5 ? round(miles) : miles
}

export function celsiusToFahrenheit(celsius: number): number {
	return round(1.8 * celsius + 32)
}

export function inHgToHPa(inHg: number): number {
	return round(inHg / IN_HG_PER_HPA)
}

export function hPaToInHg(hPa: number): number {
	return round(hPa * IN_HG_PER_HPA, 2)
}
