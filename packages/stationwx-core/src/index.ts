// Context
export type { Context, ContextKey } from "./context"
export { contextKey, contextValue } from "./context"

// Actions
export type { ActionDefinition } from "./action"
export { UnknownActionError } from "./action"

// Feed
export type { FeedItem, FeedItemSignals } from "./feed"
export { TimeRelevance } from "./feed"

// Feed Source
export type { FeedSource } from "./feed-source"
