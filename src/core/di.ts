/**
 * Service lifecycle contract and registry.
 *
 * Services that hold resources (the SQLite handle) implement
 * BaseService so the container can start them in registration order and
 * stop them in reverse.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

export interface BaseService {
  /** Acquire resources. Called once, before the service is used. */
  initialize(): Promise<void>

  /** Release resources. Called during container shutdown in reverse order. */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Ordered registry of named services.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', databaseService)
 * await registry.initializeAll()
 * // ...
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _entries: Array<{ name: string; service: BaseService }> = []
  private _initialized: string[] = []

  /**
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._entries.push({ name, service })
  }

  has(name: string): boolean {
    return this._entries.some((entry) => entry.name === name)
  }

  /**
   * Initialize every service in registration order. Stops at the first
   * failure; services initialized before it are still shut down by
   * shutdownAll().
   */
  async initializeAll(): Promise<void> {
    for (const { name, service } of this._entries) {
      await service.initialize()
      this._initialized.push(name)
    }
  }

  /**
   * Shut down initialized services in reverse order. Every service gets a
   * chance to stop; errors are collected into an AggregateError.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    const names = [...this._initialized].reverse()
    this._initialized = []

    for (const name of names) {
      const entry = this._entries.find((e) => e.name === name)
      if (entry === undefined) continue
      try {
        await entry.service.shutdown()
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
    return this._entries.map((entry) => entry.name)
  }
}
