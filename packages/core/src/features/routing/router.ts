import { noBackendAvailable, TtsProxyError } from "../../errors.js"
import { createChildLogger } from "../../logger.js"
import type { BackendAdapter } from "../../lib/tts/types.js"

const log = createChildLogger("router")

export type BackendStatus = {
  name: string
  available: boolean
  port: number
  resource_cost: number
  active: boolean
}

/**
 * Ordered registry of backends plus an optional preferred backend. Registration
 * order is the failover priority when no preference applies.
 */
export class BackendRouter {
  private backends: BackendAdapter[] = []
  private preferredName: string | null = null

  constructor(backends: BackendAdapter[] = []) {
    for (const backend of backends) {
      this.register(backend)
    }
  }

  register(backend: BackendAdapter): void {
    if (this.getBackend(backend.name)) {
      throw new TtsProxyError(`Backend already registered: ${backend.name}`, "CONFIG_ERROR", 1, 500)
    }
    this.backends = [...this.backends, backend]
  }

  /** Preferred name, or null when unset or no longer registered. */
  get preferred(): string | null {
    if (this.preferredName && this.getBackend(this.preferredName)) {
      return this.preferredName
    }
    return null
  }

  get names(): string[] {
    return this.backends.map((backend) => backend.name)
  }

  getBackend(name: string): BackendAdapter | undefined {
    return this.backends.find((backend) => backend.name === name)
  }

  /** Returns false for names that are not registered. Null clears the preference. */
  setPreferred(name: string | null): boolean {
    if (name === null) {
      this.preferredName = null
      log.info("cleared preferred backend")
      return true
    }
    if (!this.getBackend(name)) {
      return false
    }
    this.preferredName = name
    log.info({ backend: name }, "set preferred backend")
    return true
  }

  /** A check that rejects counts as unavailable. */
  private async probe(backend: BackendAdapter): Promise<boolean> {
    try {
      return await backend.isAvailable()
    } catch (error) {
      log.warn({ backend: backend.name, err: error }, "availability check failed")
      return false
    }
  }

  async getActiveBackend(): Promise<BackendAdapter> {
    // Later register/setPreferred calls do not affect a resolution already in flight.
    const backends = this.backends
    const preferred = this.preferred
    const preferredBackend = preferred ? backends.find((backend) => backend.name === preferred) : undefined

    if (preferredBackend) {
      if (await this.probe(preferredBackend)) {
        log.debug({ backend: preferredBackend.name }, "using preferred backend")
        return preferredBackend
      }
      log.warn({ backend: preferredBackend.name }, "preferred backend not available")
    }

    for (const backend of backends) {
      if (await this.probe(backend)) {
        log.debug({ backend: backend.name }, "using available backend")
        return backend
      }
    }

    throw noBackendAvailable()
  }

  async listBackends(): Promise<BackendStatus[]> {
    const backends = this.backends
    const preferred = this.preferred
    const availability = await Promise.all(backends.map((backend) => this.probe(backend)))

    const preferredIndex = backends.findIndex(
      (backend, index) => backend.name === preferred && availability[index],
    )
    const activeIndex = preferredIndex >= 0 ? preferredIndex : availability.indexOf(true)

    return backends.map((backend, index) => ({
      name: backend.name,
      available: availability[index],
      port: backend.port,
      resource_cost: backend.resourceCost,
      active: index === activeIndex,
    }))
  }
}
