import { createError } from "@strata/errors"
import {
  type ManagedServiceRegistry,
  type ManagedServiceType,
  type ServiceLease,
  UNLIMITED_USAGES,
} from "../../ports/managed-service"
import { ManagedServiceProvider } from "./managed-service-provider"

type Registration = {
  readonly provider: ManagedServiceProvider<unknown>
  readonly maxUsages: number
  inUse: number
}

function isCloseable(value: unknown): value is { close(): unknown } {
  return (
    typeof value === "object" &&
    value !== null &&
    "close" in value &&
    typeof value.close === "function"
  )
}

export class DefaultManagedServiceRegistry implements ManagedServiceRegistry {
  private readonly registrations = new Map<string, Registration>()

  register<S, P>(
    name: string,
    implementationType: ManagedServiceType<S, P>,
    parameters: P,
    maxUsages: number = UNLIMITED_USAGES,
  ): ManagedServiceProvider<S> {
    const existing = this.registrations.get(name)

    if (existing) {
      if (existing.provider.provides(implementationType)) return existing.provider

      throw createError(
        "service-conflict",
        `Service '${name}' is already registered with a different implementation`,
        {
          context: {
            name,
            registered: existing.provider.implementationType.name,
            requested: implementationType.name,
          },
          isOperational: false,
        },
      )
    }

    const provider = new ManagedServiceProvider<S>(
      name,
      implementationType,
      parameters,
      () => new implementationType(parameters),
    )

    this.registrations.set(name, { provider, maxUsages, inUse: 0 })

    return provider
  }

  usageLimitOf(provider: ManagedServiceProvider<unknown>): number {
    return this.registrationOf(provider).maxUsages
  }

  /**
   * Take one usage of the service. Throws `service-usage-exceeded` when all
   * usages allowed by the service's limit are taken.
   */
  acquire(provider: ManagedServiceProvider<unknown>): ServiceLease {
    const registration = this.registrationOf(provider)

    if (registration.maxUsages !== UNLIMITED_USAGES && registration.inUse >= registration.maxUsages) {
      throw createError(
        "service-usage-exceeded",
        `Service '${provider.name}' is limited to ${registration.maxUsages} concurrent usages`,
        {
          context: { name: provider.name, maxUsages: registration.maxUsages },
          isRetryable: true,
        },
      )
    }

    registration.inUse++

    let released = false
    return {
      release: () => {
        if (released) return
        released = true
        registration.inUse--
      },
    }
  }

  /** Close every service that has been created and exposes `close()`. */
  async close(): Promise<void> {
    for (const { provider } of this.registrations.values()) {
      const instance = provider.instantiated
      if (isCloseable(instance)) await instance.close()
    }
  }

  private registrationOf(provider: ManagedServiceProvider<unknown>): Registration {
    const registration = this.registrations.get(provider.name)

    if (!registration || registration.provider !== provider) {
      throw createError("unknown-service", `Service '${provider.name}' is not registered`, {
        context: { name: provider.name },
        isOperational: false,
      })
    }

    return registration
  }
}
