export class ConfigError extends Error {
	constructor(summary: string) {
		super(`Invalid configuration: ${summary}`)
		this.name = "ConfigError"
	}
}
