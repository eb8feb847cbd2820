import { GroupKind, Step, type GroupDecoder } from "./group"
import { CloudCover, type CloudLayer } from "./observation"

const CloudDescription: Readonly<Record<CloudCover, string>> = Object.freeze({
	[CloudCover.Clear]: "clear",
	[CloudCover.ClearAutomated]: "clear",
	[CloudCover.Few]: "partly cloudy",
	[CloudCover.Scattered]: "scattered clouds",
	[CloudCover.Broken]: "mostly cloudy",
	[CloudCover.Overcast]: "overcast",
	[CloudCover.VerticalVisibility]: "vertical visibility",
})

// cccnnn with nnn in hundreds of feet; CB/TCU suffixes are ignored
const LAYER_PATTERN = /^(FEW|SCT|BKN|OVC|VV)(\d{3})/

function toLayerCover(code: string | undefined): CloudCover | null {
	switch (code) {
		case CloudCover.Few:
		case CloudCover.Scattered:
		case CloudCover.Broken:
		case CloudCover.Overcast:
		case CloudCover.VerticalVisibility:
			return code
		default:
			return null
	}
}

/**
 * Parses a single sky-condition group. Returns null when the token is not one.
 */
export function parseCloudLayer(token: string): CloudLayer | null {
	if (token === CloudCover.Clear || token === CloudCover.ClearAutomated) {
		return { cover: token, description: CloudDescription[token], altitudeFt: null }
	}

	const match = LAYER_PATTERN.exec(token)
	const cover = toLayerCover(match?.[1])
	if (!match || !cover) {
		return null
	}

	return {
		cover,
		description: CloudDescription[cover],
		altitudeFt: cover === CloudCover.VerticalVisibility ? Number(match[2]) * 100 : null,
	}
}

/**
 * Only the last reported layer is kept; each match replaces the previous one.
 */
export const cloudLayerGroup: GroupDecoder = {
	kind: GroupKind.CloudLayer,
	decode(token, observation) {
		const layer = parseCloudLayer(token)
		if (!layer) {
			return Step.absent
		}
		observation.cloudLayer = layer
		return layer.cover === CloudCover.Clear || layer.cover === CloudCover.ClearAutomated
			? Step.consumed
			: Step.repeat
	},
}
