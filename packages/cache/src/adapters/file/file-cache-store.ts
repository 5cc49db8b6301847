import { createHash, randomUUID } from "node:crypto"
import type { BigIntStats } from "node:fs"
import { link, mkdir, open, readdir, rename, rm, stat, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { backendUnavailable } from "../../core/errors/cache-error"
import type { Clock } from "../../core/time/clock"
import { isExpired, resolveExpiresAtMs } from "../../core/time/resolve-expiry"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheStore } from "../../ports/cache-store"
import type { Milliseconds } from "../../ports/time"

export type FileCacheStoreOptions = {
  /**
   * Directory holding one file per entry. Created on first write.
   */
  directory: string
}

export type FileCacheStoreDeps = {
  clock: Clock
}

/**
 * On-disk layout of one entry. The key is kept to detect digest collisions.
 */
type FileEnvelope = {
  key: CacheKey
  expiresAt: Milliseconds | null
  value: string
}

const ENTRY_SUFFIX = ".entry"

/**
 * Stores each entry as `<sha256(key)>.entry`, a JSON envelope holding the
 * key, the absolute expiry and the value in base64. Writes go through a
 * temporary file and a rename, so readers never see a partial entry.
 *
 * Unreadable envelopes are treated as a miss and removed. Removal of an
 * unreadable or expired entry never takes out a write that replaced it.
 */
export class FileCacheStore implements CacheStore {
  readonly name = "file"

  public constructor(
    private readonly deps: FileCacheStoreDeps,
    private readonly opts: FileCacheStoreOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const envelope = await this.read(key)
    if (envelope === undefined) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(Buffer.from(envelope.value, "base64")) }
  }

  async set(
    key: CacheKey,
    value: Uint8Array,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    await this.write(key, value, resolveExpiresAtMs(opts?.ttl, this.deps.clock.nowMs()))
  }

  async delete(key: CacheKey): Promise<void> {
    await this.remove(this.pathFor(key), "delete")
  }

  async clear(): Promise<void> {
    let names: string[]

    try {
      names = await readdir(this.opts.directory)
    } catch (err) {
      if (isNotFound(err)) return
      throw backendUnavailable(this.name, "clear", err)
    }

    await Promise.all(
      names
        .filter((name) => name.endsWith(ENTRY_SUFFIX) || name.endsWith(".tmp"))
        .map((name) => this.remove(join(this.opts.directory, name), "clear")),
    )
  }

  async has(key: CacheKey): Promise<boolean> {
    return (await this.read(key)) !== undefined
  }

  async getMany(
    keys: readonly CacheKey[],
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    const out = new Map<CacheKey, CacheResult<Uint8Array>>()

    for (const key of keys) {
      if (!out.has(key)) out.set(key, await this.get(key))
    }

    return out
  }

  async setMany(
    entries: readonly CacheEntry<Uint8Array>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    const expiresAtMs = resolveExpiresAtMs(opts?.ttl, this.deps.clock.nowMs())
    const latest = new Map<CacheKey, Uint8Array>(entries)

    await Promise.all(
      [...latest].map(([key, value]) => this.write(key, value, expiresAtMs)),
    )
  }

  async deleteMany(keys: readonly CacheKey[]): Promise<void> {
    await Promise.all(
      [...new Set(keys)].map((key) => this.remove(this.pathFor(key), "deleteMany")),
    )
  }

  private pathFor(key: CacheKey): string {
    const digest = createHash("sha256").update(key).digest("hex")

    return join(this.opts.directory, `${digest}${ENTRY_SUFFIX}`)
  }

  private async read(key: CacheKey): Promise<FileEnvelope | undefined> {
    const path = this.pathFor(key)
    let raw: string
    let identity: BigIntStats

    try {
      const handle = await open(path, "r")
      try {
        identity = await handle.stat({ bigint: true })
        raw = await handle.readFile("utf8")
      } finally {
        await handle.close()
      }
    } catch (err) {
      if (isNotFound(err)) return undefined
      throw backendUnavailable(this.name, "get", err)
    }

    const envelope = parseEnvelope(raw)

    if (envelope === undefined) {
      await this.discard(path, identity)
      return undefined
    }

    if (envelope.key !== key) return undefined

    if (isExpired(envelope.expiresAt ?? undefined, this.deps.clock.nowMs())) {
      await this.discard(path, identity)
      return undefined
    }

    return envelope
  }

  /**
   * Removes `path` only if it still names the file that was read. The entry is
   * renamed aside first; when that turns out to be a newer write, it is
   * linked back unless an even newer one has taken its place.
   */
  private async discard(path: string, identity: BigIntStats): Promise<void> {
    const aside = `${path}.${randomUUID()}.tmp`

    try {
      await rename(path, aside)
    } catch (err) {
      if (isNotFound(err)) return
      throw backendUnavailable(this.name, "get", err)
    }

    try {
      const moved = await stat(aside, { bigint: true })

      if (moved.ino !== identity.ino || moved.dev !== identity.dev) {
        await link(aside, path).catch((err: unknown) => {
          if (!isAlreadyExists(err)) throw err
        })
      }
    } catch (err) {
      throw backendUnavailable(this.name, "get", err)
    } finally {
      await rm(aside, { force: true })
    }
  }

  private async write(
    key: CacheKey,
    value: Uint8Array,
    expiresAtMs: Milliseconds | undefined,
  ): Promise<void> {
    const path = this.pathFor(key)
    const tmp = `${path}.${randomUUID()}.tmp`
    const envelope: FileEnvelope = {
      key,
      expiresAt: expiresAtMs ?? null,
      value: Buffer.from(value).toString("base64"),
    }

    try {
      await mkdir(this.opts.directory, { recursive: true })
      await writeFile(tmp, JSON.stringify(envelope))
      await rename(tmp, path)
    } catch (err) {
      await rm(tmp, { force: true }).catch(() => undefined)
      throw backendUnavailable(this.name, "set", err)
    }
  }

  private async remove(path: string, operation: string): Promise<void> {
    try {
      await rm(path, { force: true })
    } catch (err) {
      throw backendUnavailable(this.name, operation, err)
    }
  }
}

function parseEnvelope(raw: string): FileEnvelope | undefined {
  let parsed: unknown

  try {
    parsed = JSON.parse(raw)
  } catch {
    return undefined
  }

  if (typeof parsed !== "object" || parsed === null) return undefined
  if (!("key" in parsed) || typeof parsed.key !== "string") return undefined
  if (!("value" in parsed) || typeof parsed.value !== "string") return undefined
  if (!("expiresAt" in parsed)) return undefined

  const { expiresAt } = parsed
  if (expiresAt !== null && typeof expiresAt !== "number") return undefined

  return {
    key: parsed.key,
    value: parsed.value,
    expiresAt: typeof expiresAt === "number" ? expiresAt : null,
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST"
}
