import type { ActionDefinition } from "./action"
import type { Context } from "./context"
import type { FeedItem } from "./feed"

/**
 * Unified interface for sources that provide context, feed items, and actions.
 *
 * Source IDs use dotted notation. Built-in sources use `stationwx.<name>`.
 */
export interface FeedSource<TItem extends FeedItem = FeedItem> {
	/** Unique identifier for this source */
	readonly id: string

	/** IDs of sources this source depends on */
	readonly dependencies?: readonly string[]

	/** List actions this source supports. Empty record if none. */
	listActions(): Promise<Record<string, ActionDefinition>>

	/** Execute an action by ID. Throws on unknown action or invalid input. */
	executeAction(actionId: string, params: unknown): Promise<unknown>

	/**
	 * Fetch context on-demand.
	 * Return null if this source cannot provide context.
	 */
	fetchContext(context: Context): Promise<Partial<Context> | null>

	/** Fetch feed items on-demand. */
	fetchItems?(context: Context): Promise<TItem[]>
}
