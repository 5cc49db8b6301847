/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and the bytes a {@link CacheStore} persists.
 *
 * @remarks
 * Codecs sit at the boundary between the typed `CacheManager<T>` and the
 * byte-oriented stores. Stores treat codec output as opaque bytes.
 *
 * `decode` may throw on malformed input; the manager treats that as a corrupt
 * entry (a miss) and deletes the offending key.
 *
 * Plain JSON codecs do not preserve `Date`, `Map`, `Set`, `BigInt` or class
 * instances. Define a domain-specific codec if that matters.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
