import path from "node:path"

import { createChildLogger } from "../../logger.js"
import { BackendGenerationError } from "./types.js"

const log = createChildLogger("backend-http")

/** How long a successful probe is trusted before probing again. */
export const AVAILABILITY_TTL_MS = 30_000
export const DEFAULT_PROBE_TIMEOUT_MS = 2_000
export const DEFAULT_GENERATE_TIMEOUT_MS = 120_000

/**
 * Remembers the last successful probe for a bounded time. Failures are never
 * cached, so a backend that comes back is picked up on the next probe.
 */
export class AvailabilityCache {
  private lastAvailableAt: number | null = null

  constructor(
    private readonly ttlMs = AVAILABILITY_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  isFresh(): boolean {
    return this.lastAvailableAt !== null && this.now() - this.lastAvailableAt < this.ttlMs
  }

  markAvailable(): void {
    this.lastAvailableAt = this.now()
  }

  invalidate(): void {
    this.lastAvailableAt = null
  }

  async check(probe: () => Promise<boolean>): Promise<boolean> {
    if (this.isFresh()) {
      return true
    }
    const available = await probe()
    if (available) {
      this.markAvailable()
    } else {
      this.invalidate()
    }
    return available
  }
}

/**
 * A single cached value with an explicit fetch timestamp.
 */
export class TimedCache<T> {
  private value: T | null = null
  private fetchedAt = 0

  constructor(
    private readonly ttlMs = AVAILABILITY_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  get(): T | null {
    if (this.value === null || this.now() - this.fetchedAt >= this.ttlMs) {
      return null
    }
    return this.value
  }

  set(value: T): void {
    this.value = value
    this.fetchedAt = this.now()
  }

  clear(): void {
    this.value = null
    this.fetchedAt = 0
  }
}

/**
 * Cloning voices arrive as `<voice dir>/<name>/reference.wav`; servers that keep
 * their own copy of the voice only want `<name>`.
 */
export function presetNameFrom(voice: string): string {
  if (voice.includes("/")) {
    return path.basename(path.dirname(voice))
  }
  return voice
}

export function joinUrl(base: string, pathname: string): string {
  return `${base.replace(/\/+$/, "")}${pathname}`
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")
}

/**
 * GET health probe. Any network error, timeout, non-2xx status or rejected body
 * resolves to false.
 */
export async function probeUrl(
  url: string,
  options: {
    timeoutMs?: number
    headers?: Record<string, string>
    accept?: (response: Response) => Promise<boolean>
  } = {},
): Promise<boolean> {
  try {
    const response = await fetch(url, {
      method: "GET",
      headers: options.headers,
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS),
    })
    if (!response.ok) {
      return false
    }
    return options.accept ? await options.accept(response) : true
  } catch (error) {
    log.debug({ url, err: error }, "probe failed")
    return false
  }
}

/** Accepts a JSON health body only when it reports `model_loaded: true`. */
export async function modelLoaded(response: Response): Promise<boolean> {
  const body: unknown = await response.json()
  return typeof body === "object" && body !== null && "model_loaded" in body && body.model_loaded === true
}

export async function requestAudio(
  backend: string,
  url: string,
  init: {
    method?: "GET" | "POST"
    json?: unknown
    form?: FormData
    headers?: Record<string, string>
    timeoutMs?: number
  },
): Promise<Response> {
  const timeoutMs = init.timeoutMs ?? DEFAULT_GENERATE_TIMEOUT_MS
  const headers: Record<string, string> = { ...init.headers }
  let body: string | FormData | undefined

  if (init.json !== undefined) {
    headers["Content-Type"] = "application/json"
    body = JSON.stringify(init.json)
  } else if (init.form) {
    body = init.form
  }

  let response: Response
  try {
    response = await fetch(url, {
      method: init.method ?? "POST",
      headers,
      body,
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error) {
    if (isTimeout(error)) {
      throw new BackendGenerationError(backend, `${backend} request timed out after ${timeoutMs}ms.`, "BACKEND_TIMEOUT")
    }
    const message = error instanceof Error ? error.message : "Unknown error"
    throw new BackendGenerationError(backend, `${backend} request failed: ${message}`, "BACKEND_UNAVAILABLE")
  }

  if (!response.ok) {
    const responseText = await response.text().catch(() => "")
    throw new BackendGenerationError(
      backend,
      `${backend} error: ${response.status} ${responseText.slice(0, 200)}`.trim(),
      "BACKEND_ERROR",
    )
  }

  return response
}

export async function readAudioBody(backend: string, response: Response): Promise<Buffer> {
  const audio = Buffer.from(await response.arrayBuffer())
  if (audio.length === 0) {
    throw new BackendGenerationError(backend, `${backend} returned an empty audio response.`, "BACKEND_BAD_PAYLOAD")
  }
  return audio
}

export function isAudioResponse(response: Response): boolean {
  return (response.headers.get("content-type") ?? "").startsWith("audio/")
}

/**
 * Picks the host to talk to for a service that may run on several machines.
 * Precedence: explicit host, then the last discovered host while it stays healthy,
 * then the first healthy host of the fleet list in order.
 */
export class FleetHostResolver {
  private discovered: string | null = null

  constructor(
    private readonly options: {
      explicitHost: string | null
      fleet: string[]
      probe: (host: string) => Promise<boolean>
    },
  ) {}

  async resolve(): Promise<string | null> {
    const { explicitHost, fleet, probe } = this.options

    if (explicitHost) {
      return (await probe(explicitHost)) ? explicitHost : null
    }

    if (this.discovered && (await probe(this.discovered))) {
      return this.discovered
    }

    this.discovered = null
    for (const host of fleet) {
      if (await probe(host)) {
        log.info({ host }, "discovered fleet host")
        this.discovered = host
        return host
      }
    }
    return null
  }

  /** Explicit or previously discovered host, without probing. */
  knownHost(): string | null {
    return this.options.explicitHost ?? this.discovered
  }

  /** Best guess without probing, used when a call must be attempted anyway. */
  currentHost(): string | null {
    return this.options.explicitHost ?? this.discovered ?? this.options.fleet[0] ?? null
  }
}
