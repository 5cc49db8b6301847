import { createClient, RESP_TYPES } from "redis"

export type RedisExpiration = { expiration: { type: "PX"; value: number } }

export type RedisScanOptions = { MATCH: string; COUNT: number }

export type RedisScanReply = {
  cursor: string | Buffer
  keys: readonly (string | Buffer)[]
}

/**
 * The subset of a node-redis client the store uses, with bulk strings mapped
 * to `Buffer` so values round-trip as raw bytes.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>

  set(key: string, value: Buffer, opts?: RedisExpiration): Promise<unknown>
  del(keys: string | readonly string[]): Promise<number>
  unlink(keys: readonly string[]): Promise<number>
  exists(keys: string | readonly string[]): Promise<number>
  incrBy(key: string, increment: number): Promise<number>
  scan(cursor: string, opts: RedisScanOptions): Promise<RedisScanReply>

  multi(): {
    set(key: string, value: Buffer, opts?: RedisExpiration): unknown
    del(keys: string | readonly string[]): unknown
    exec(): Promise<unknown>
  }

  connect(): Promise<unknown>
  close(): Promise<unknown>
  readonly isOpen: boolean

  /** Socket and reconnect failures arrive here; without a listener they crash the process. */
  on(event: "error", listener: (err: Error) => void): unknown
  listenerCount(event: "error"): number
}

export function createRedisBytesClient(url: string): RedisBytesClient {
  return createClient({ url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
