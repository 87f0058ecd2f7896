/**
 * Service lifecycle contract and registry.
 *
 * The engine factory constructs every service with its dependencies injected,
 * registers it here, and drives startup/shutdown through the registry so that
 * services shut down in the reverse of the order they started.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for engine services.
 */
export interface BaseService {
  /**
   * Prepare the service (validate configuration, subscribe to events).
   * Called after all services are constructed and before `engine:ready`.
   */
  initialize(): Promise<void>

  /**
   * Release resources and wait for in-flight work.
   * Called during engine shutdown in reverse registration order.
   */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Named services in registration order.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('statusStore', store)
 * registry.register('taskOrchestrator', orchestrator)
 * await registry.initializeAll()
 * await registry.shutdownAll() // orchestrator first, then store
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _order: string[] = []

  /**
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  /**
   * @throws {Error} if no service with the given name is registered.
   */
  get(name: string): BaseService {
    const service = this._services.get(name)
    if (service === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return service
  }

  has(name: string): boolean {
    return this._services.has(name)
  }

  /**
   * Initialize services in registration order, stopping at the first failure:
   * later services may rely on earlier ones being ready.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service !== undefined) {
        await service.initialize()
      }
    }
  }

  /**
   * Shut services down in reverse registration order. Every service gets its
   * turn; failures are collected and re-thrown together as an AggregateError.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    for (const name of [...this._order].reverse()) {
      const service = this._services.get(name)
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  /** Names of all registered services in registration order */
  get serviceNames(): string[] {
    return [...this._order]
  }
}
