/**
 * A prefix that scopes a network store to a partition of a shared keyspace
 * (e.g. a Redis server also used for sessions or rate limiting).
 *
 * Stores treat this value as an opaque string and prepend it to every key
 * they touch, including the scan pattern used by `clear()`.
 *
 * @example "app:prod:cache:"
 */
export type KeyspacePrefix = string
