import { createNullLogger } from "../../../core/logging/null-logger"
import { describeCacheStoreContract } from "../../../ports/__tests__/cache-store.contract"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { MemoryCacheStore } from "../../memory/memory-cache-store"
import { CompositeCacheStore } from "../composite-cache-store"

for (const policy of ["fallback", "replicate"] as const) {
  describeCacheStoreContract(
    `CompositeCacheStore (${policy})`,
    async () => {
      const clock = new ManualTestClock()

      return {
        store: new CompositeCacheStore(
          {
            stores: [new MemoryCacheStore({ clock }), new MemoryCacheStore({ clock })],
            logger: createNullLogger(),
          },
          { policy },
        ),
        clock,
      }
    },
    { counters: false },
  )
}
