import { type MockProxy, mock } from "vitest-mock-extended"
import { isCacheError } from "../../../core/errors/cache-error"
import { bytes, keys } from "../../../tests/utils/cache-test-helpers"
import { ManualTestClock, TEST_EPOCH_MS } from "../../../tests/utils/manual-test-clock"
import { isValidTableName, type PgQueryable, PostgresCacheStore } from "../postgres-cache-store"

describe("PostgresCacheStore (behavior)", () => {
  let client: MockProxy<PgQueryable>
  let clock: ManualTestClock
  let store: PostgresCacheStore

  beforeEach(() => {
    client = mock<PgQueryable>()
    client.query.mockResolvedValue({ rows: [] })
    clock = new ManualTestClock()
    store = new PostgresCacheStore({ client, clock }, { tableName: "cache_entries" })
  })

  function sqlOf(call: number): string {
    return String(client.query.mock.calls[call]?.[0]).replace(/\s+/g, " ").trim()
  }

  function paramsOf(call: number): unknown[] | undefined {
    return client.query.mock.calls[call]?.[1]
  }

  describe("table name", () => {
    it.each(["cache_entries", "cache.entries", "_Entries2"])("accepts %s", (name) => {
      expect(isValidTableName(name)).toBe(true)
    })

    it.each(["", "1cache", "cache entries", "cache;drop table x", "a.b.c", '"quoted"'])(
      "rejects %j",
      (name) => {
        expect(isValidTableName(name)).toBe(false)
      },
    )

    it("refuses to construct with an invalid name", () => {
      let caught: unknown

      try {
        new PostgresCacheStore({ client, clock }, { tableName: "x; drop table y" })
      } catch (err) {
        caught = err
      }

      expect(isCacheError(caught, "cache_configuration_invalid")).toBe(true)
    })
  })

  it("ensureSchema creates the entry table", async () => {
    await store.ensureSchema()

    expect(sqlOf(0)).toBe(
      "create table if not exists cache_entries ( key text primary key, value bytea not null, expires_at bigint )",
    )
  })

  describe("reads", () => {
    it("returns a hit for a live row", async () => {
      client.query.mockResolvedValueOnce({
        rows: [{ key: keys.one(), value: Buffer.from([1, 2, 3]), expires_at: null }],
      })

      expect(await store.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
      expect(paramsOf(0)).toStrictEqual([[keys.one()]])
    })

    it("reports an expired row as a miss and deletes it", async () => {
      client.query.mockResolvedValueOnce({
        rows: [
          {
            key: keys.one(),
            value: Buffer.from([1, 2, 3]),
            expires_at: String(TEST_EPOCH_MS),
          },
        ],
      })

      expect(await store.get(keys.one())).toStrictEqual({ kind: "miss" })
      expect(sqlOf(1)).toBe("delete from cache_entries where key = any($1) and expires_at <= $2")
      expect(paramsOf(1)).toStrictEqual([[keys.one()], TEST_EPOCH_MS])
    })

    it("getMany queries distinct keys once and keeps input order", async () => {
      client.query.mockResolvedValueOnce({
        rows: [{ key: keys.two(), value: Buffer.from([9, 8, 7]), expires_at: "9999999999999" }],
      })

      const res = await store.getMany([keys.one(), keys.two(), keys.one()])

      expect(client.query).toHaveBeenCalledTimes(1)
      expect(paramsOf(0)).toStrictEqual([[keys.one(), keys.two()]])
      expect([...res.entries()]).toStrictEqual([
        [keys.one(), { kind: "miss" }],
        [keys.two(), { kind: "hit", value: bytes.b() }],
      ])
    })

    it("has checks the expiry against the clock", async () => {
      client.query.mockResolvedValueOnce({ rows: [{ present: 1 }] })

      expect(await store.has(keys.one())).toBe(true)
      expect(paramsOf(0)).toStrictEqual([keys.one(), TEST_EPOCH_MS])
    })
  })

  describe("writes", () => {
    it("upserts with an absolute expiry", async () => {
      await store.set(keys.one(), bytes.a(), { ttl: { kind: "seconds", seconds: 60 } })

      expect(sqlOf(0)).toContain("on conflict (key) do update")
      expect(paramsOf(0)).toStrictEqual([
        [keys.one()],
        [Buffer.from([1, 2, 3])],
        TEST_EPOCH_MS + 60_000,
      ])
    })

    it("stores a null expiry when there is no TTL", async () => {
      await store.set(keys.one(), bytes.a())

      expect(paramsOf(0)?.[2]).toBeNull()
    })

    it("setMany keeps only the last value of a duplicated key", async () => {
      await store.setMany([
        [keys.one(), bytes.a()],
        [keys.two(), bytes.c()],
        [keys.one(), bytes.b()],
      ])

      expect(client.query).toHaveBeenCalledTimes(1)
      expect(paramsOf(0)).toStrictEqual([
        [keys.one(), keys.two()],
        [Buffer.from([9, 8, 7]), Buffer.from([4, 5, 6])],
        null,
      ])
    })

    it("setMany([]) sends nothing", async () => {
      await store.setMany([])

      expect(client.query).not.toHaveBeenCalled()
    })

    it("deleteMany sends distinct keys", async () => {
      await store.deleteMany([keys.one(), keys.one(), keys.two()])

      expect(sqlOf(0)).toBe("delete from cache_entries where key = any($1)")
      expect(paramsOf(0)).toStrictEqual([[keys.one(), keys.two()]])
    })

    it("clear deletes every row", async () => {
      await store.clear()

      expect(sqlOf(0)).toBe("delete from cache_entries")
    })
  })

  describe("increment", () => {
    it("returns the counter computed by the upsert", async () => {
      client.query.mockResolvedValueOnce({ rows: [{ counter: "7" }] })

      expect(await store.increment(keys.one(), 5)).toBe(7)
      expect(paramsOf(0)).toStrictEqual([keys.one(), "5", TEST_EPOCH_MS])
    })

    it("rejects when no counter comes back", async () => {
      client.query.mockResolvedValueOnce({ rows: [] })

      await expect(store.increment(keys.one(), 1)).rejects.toThrow(
        "postgres: increment failed: no counter returned",
      )
    })
  })

  it("wraps driver errors in cache_backend_unavailable", async () => {
    client.query.mockRejectedValueOnce(new Error("boom"))

    const err = await store.get(keys.one()).catch((e: unknown) => e)

    expect(isCacheError(err, "cache_backend_unavailable")).toBe(true)
    expect(isCacheError(err) && err.message).toBe("postgres: get failed: boom")
  })
})
