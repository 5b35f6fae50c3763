import type { ManagedServiceProvider } from "../core/services/managed-service-provider"

/** Usage limit meaning "no limit". */
export const UNLIMITED_USAGES = -1

export type ManagedServiceType<S = unknown, P = unknown> = new (parameters: P) => S

export interface ServiceLease {
  release(): void
}

/**
 * Tracks shared services by name.
 */
export interface ManagedServiceRegistry {
  /**
   * Register a service, or return the provider already registered under
   * `name` for the same implementation type.
   */
  register<S, P>(
    name: string,
    implementationType: ManagedServiceType<S, P>,
    parameters: P,
    maxUsages: number,
  ): ManagedServiceProvider<S>

  /** The usage limit the service was registered with. */
  usageLimitOf(provider: ManagedServiceProvider<unknown>): number
}
