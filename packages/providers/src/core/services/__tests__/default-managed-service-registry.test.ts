import { UNLIMITED_USAGES } from "../../../ports/managed-service"
import { DefaultManagedServiceRegistry } from "../default-managed-service-registry"
import { ManagedServiceProvider } from "../managed-service-provider"

class CacheParameters {
  constructor(readonly size: number = 16) {}
}

class CacheService {
  static created = 0
  closed = false

  constructor(readonly parameters: CacheParameters) {
    CacheService.created++
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

class OtherService {
  constructor(readonly parameters: CacheParameters) {}
}

describe("DefaultManagedServiceRegistry", () => {
  let registry: DefaultManagedServiceRegistry

  beforeEach(() => {
    registry = new DefaultManagedServiceRegistry()
    CacheService.created = 0
  })

  describe("register", () => {
    it("returns the existing provider for the same name and type", () => {
      const first = registry.register("cache", CacheService, new CacheParameters(), 2)
      const second = registry.register("cache", CacheService, new CacheParameters(), 2)

      expect(second).toBe(first)
    })

    it("rejects another implementation under a taken name", () => {
      registry.register("cache", CacheService, new CacheParameters(), UNLIMITED_USAGES)

      expect(() => registry.register("cache", OtherService, new CacheParameters(), 1)).toThrow(
        expect.objectContaining({
          code: "service-conflict",
          context: { name: "cache", registered: "CacheService", requested: "OtherService" },
        }),
      )
    })

    it("creates the service lazily and only once", async () => {
      const parameters = new CacheParameters(64)
      const provider = registry.register("cache", CacheService, parameters, UNLIMITED_USAGES)

      expect(CacheService.created).toBe(0)
      expect(provider.instantiated).toBeUndefined()

      const first = await provider.get()
      const second = await provider.get()

      expect(first).toBe(second)
      expect(first.parameters).toBe(parameters)
      expect(CacheService.created).toBe(1)
    })

    it("is always stored as a reference", async () => {
      const provider = registry.register("cache", CacheService, new CacheParameters(), 1)

      await expect(provider.calculateExecutionTimeValue()).resolves.toEqual({
        kind: "changing",
        provider,
      })
    })
  })

  describe("usageLimitOf", () => {
    it("reports the registered limit", () => {
      const limited = registry.register("cache", CacheService, new CacheParameters(), 3)
      const unlimited = registry.register(
        "other",
        OtherService,
        new CacheParameters(),
        UNLIMITED_USAGES,
      )

      expect(registry.usageLimitOf(limited)).toBe(3)
      expect(registry.usageLimitOf(unlimited)).toBe(-1)
    })

    it("rejects providers it did not register", () => {
      const foreign = new ManagedServiceProvider(
        "cache",
        CacheService,
        new CacheParameters(),
        () => new CacheService(new CacheParameters()),
      )

      expect(() => registry.usageLimitOf(foreign)).toThrow(
        expect.objectContaining({ code: "unknown-service" }),
      )
    })
  })

  describe("acquire", () => {
    it("enforces the usage limit", () => {
      const provider = registry.register("cache", CacheService, new CacheParameters(), 1)

      const lease = registry.acquire(provider)

      expect(() => registry.acquire(provider)).toThrow(
        expect.objectContaining({ code: "service-usage-exceeded", isRetryable: true }),
      )

      lease.release()
      lease.release()

      expect(() => registry.acquire(provider).release()).not.toThrow()
    })

    it("does not limit unlimited services", () => {
      const provider = registry.register(
        "cache",
        CacheService,
        new CacheParameters(),
        UNLIMITED_USAGES,
      )

      expect(() => {
        for (let i = 0; i < 10; i++) registry.acquire(provider)
      }).not.toThrow()
    })
  })

  describe("close", () => {
    it("closes created services", async () => {
      const used = registry.register("cache", CacheService, new CacheParameters(), 1)
      registry.register("unused", OtherService, new CacheParameters(), 1)
      const service = await used.get()

      await registry.close()

      expect(service.closed).toBe(true)
    })
  })
})
