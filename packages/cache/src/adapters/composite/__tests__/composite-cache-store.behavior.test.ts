import { mock } from "vitest-mock-extended"
import { isCacheError } from "../../../core/errors/cache-error"
import { createNullLogger } from "../../../core/logging/null-logger"
import type { CacheStore } from "../../../ports/cache-store"
import { bytes, keys } from "../../../tests/utils/cache-test-helpers"
import { createCapturingLogger } from "../../../tests/utils/capturing-logger"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { MemoryCacheStore } from "../../memory/memory-cache-store"
import { CompositeCacheStore } from "../composite-cache-store"

function failingStore(name: string): CacheStore {
  const store = mock<CacheStore>({ name })
  const down = new Error(`${name} down`)

  store.get.mockRejectedValue(down)
  store.has.mockRejectedValue(down)
  store.getMany.mockRejectedValue(down)
  store.set.mockRejectedValue(down)
  store.setMany.mockRejectedValue(down)
  store.delete.mockRejectedValue(down)
  store.deleteMany.mockRejectedValue(down)
  store.clear.mockRejectedValue(down)

  return store
}

describe("CompositeCacheStore (behavior)", () => {
  let clock: ManualTestClock
  let primary: MemoryCacheStore
  let secondary: MemoryCacheStore

  beforeEach(() => {
    clock = new ManualTestClock()
    primary = new MemoryCacheStore({ clock })
    secondary = new MemoryCacheStore({ clock })
  })

  it("refuses an empty store list", () => {
    let caught: unknown

    try {
      new CompositeCacheStore({ stores: [], logger: createNullLogger() }, { policy: "fallback" })
    } catch (err) {
      caught = err
    }

    expect(isCacheError(caught, "cache_configuration_invalid")).toBe(true)
  })

  describe("fallback", () => {
    const make = (stores: CacheStore[]) => {
      const capture = createCapturingLogger()

      return {
        capture,
        composite: new CompositeCacheStore(
          { stores, logger: capture.logger },
          { policy: "fallback" },
        ),
      }
    }

    it("reads from a later store when earlier ones miss", async () => {
      const { composite } = make([primary, secondary])
      await secondary.set(keys.one(), bytes.b())

      expect(await composite.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.b() })
      expect(await composite.has(keys.one())).toBe(true)
    })

    it("prefers the primary when both hit", async () => {
      const { composite } = make([primary, secondary])
      await primary.set(keys.one(), bytes.a())
      await secondary.set(keys.one(), bytes.b())

      expect(await composite.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
    })

    it("getMany asks later stores only for the keys still missing", async () => {
      const { composite } = make([primary, secondary])
      await primary.set(keys.one(), bytes.a())
      await secondary.set(keys.two(), bytes.b())
      const spy = vi.spyOn(secondary, "getMany")

      const res = await composite.getMany([keys.one(), keys.two(), keys.three()])

      expect(spy).toHaveBeenCalledWith([keys.two(), keys.three()])
      expect([...res.entries()]).toStrictEqual([
        [keys.one(), { kind: "hit", value: bytes.a() }],
        [keys.two(), { kind: "hit", value: bytes.b() }],
        [keys.three(), { kind: "miss" }],
      ])
    })

    it("skips a failing store and logs a warning", async () => {
      const { composite, capture } = make([failingStore("broken"), secondary])
      await secondary.set(keys.one(), bytes.b())

      expect(await composite.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.b() })

      const warnings = capture.atLevel("warn")
      expect(warnings).toHaveLength(1)
      expect(warnings[0]?.payload).toMatchObject({
        msg: "composite member failed",
        operation: "get",
        store: "broken",
      })
    })

    it("rejects when every store failed", async () => {
      const { composite } = make([failingStore("a"), failingStore("b")])

      const err = await composite.get(keys.one()).catch((e: unknown) => e)

      expect(isCacheError(err, "cache_backend_unavailable")).toBe(true)
      expect(isCacheError(err) && err.message).toBe("composite: get failed: b down")
    })

    it("writes, deletes and clears only the primary", async () => {
      const { composite } = make([primary, secondary])
      await secondary.set(keys.two(), bytes.b())

      await composite.set(keys.one(), bytes.a())
      await composite.clear()
      await composite.set(keys.three(), bytes.c())

      expect(await primary.get(keys.three())).toStrictEqual({ kind: "hit", value: bytes.c() })
      expect(await primary.has(keys.one())).toBe(false)
      expect(await secondary.has(keys.three())).toBe(false)
      expect(await secondary.has(keys.two())).toBe(true)
    })

    it("propagates a primary write failure", async () => {
      const { composite } = make([failingStore("broken"), secondary])

      await expect(composite.set(keys.one(), bytes.a())).rejects.toThrow(
        "composite: set failed: broken down",
      )
    })
  })

  describe("replicate", () => {
    const make = (stores: CacheStore[]) => {
      const capture = createCapturingLogger()

      return {
        capture,
        composite: new CompositeCacheStore(
          { stores, logger: capture.logger },
          { policy: "replicate" },
        ),
      }
    }

    it("writes to every store", async () => {
      const { composite } = make([primary, secondary])

      await composite.setMany([[keys.one(), bytes.a()]], { ttl: { kind: "seconds", seconds: 5 } })

      expect(await primary.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
      expect(await secondary.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })

      clock.advanceSeconds(5)
      expect(await secondary.has(keys.one())).toBe(false)
    })

    it("deletes and clears every store", async () => {
      const { composite } = make([primary, secondary])
      await composite.set(keys.one(), bytes.a())
      await composite.set(keys.two(), bytes.b())

      await composite.delete(keys.one())
      expect(await secondary.has(keys.one())).toBe(false)

      await composite.clear()
      expect(secondary.size).toBe(0)
    })

    it("logs a secondary failure and still succeeds", async () => {
      const { composite, capture } = make([primary, failingStore("replica")])

      await composite.set(keys.one(), bytes.a())

      expect(await primary.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
      expect(capture.atLevel("warn").map((log) => log.payload.store)).toStrictEqual(["replica"])
    })

    it("rejects when the primary fails, after trying the others", async () => {
      const { composite } = make([failingStore("broken"), secondary])

      await expect(composite.set(keys.one(), bytes.a())).rejects.toThrow(
        "composite: set failed: broken down",
      )
      expect(await secondary.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
    })

    it("reads from the first store that answers", async () => {
      const { composite } = make([failingStore("broken"), secondary])
      await secondary.set(keys.one(), bytes.b())

      expect(await composite.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.b() })
    })

    it("returns the primary's miss without consulting later stores", async () => {
      const { composite } = make([primary, secondary])
      await secondary.set(keys.one(), bytes.b())

      expect(await composite.get(keys.one())).toStrictEqual({ kind: "miss" })
    })
  })

  it("does not offer a native counter", () => {
    const composite = new CompositeCacheStore(
      { stores: [primary], logger: createNullLogger() },
      { policy: "fallback" },
    )

    expect("increment" in composite).toBe(false)
  })
})
