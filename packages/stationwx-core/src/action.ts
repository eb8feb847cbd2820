/**
 * Thrown by `FeedSource.executeAction` for an action ID the source does not list.
 */
export class UnknownActionError extends Error {
	readonly actionId: string

	constructor(actionId: string) {
		super(`Unknown action: ${actionId}`)
		this.name = "UnknownActionError"
		this.actionId = actionId
	}
}

/**
 * Describes an action a source can perform.
 *
 * Action IDs use verb-noun kebab-case. Combined with the source's ID they form
 * a globally unique identifier: `<sourceId>/<actionId>`.
 */
export interface ActionDefinition {
	readonly id: string
	readonly description?: string
}
