import { z } from "zod"

import { createChildLogger } from "../../../logger.js"
import {
  AvailabilityCache,
  FleetHostResolver,
  joinUrl,
  presetNameFrom,
  probeUrl,
  readAudioBody,
  requestAudio,
  TimedCache,
} from "../http.js"
import { BackendGenerationError, type BackendAdapter, type GenerateRequest } from "../types.js"

const NAME = "voxcpm15"
const MODEL = "voxcpm-1.5"
const FALLBACK_VOICES = ["default"]
const VOICES_TTL_MS = 300_000

const log = createChildLogger("voxcpm15")

const voicesResponseSchema = z.object({ voices: z.array(z.string()) })

export type VoxCpm15BackendOptions = {
  /** Pins the backend to one host; disables fleet discovery. */
  host: string | null
  fleet: string[]
  timeoutMs?: number
}

/**
 * Voices live on the server (`voice_refs/<name>`), so only the voice directory name
 * is sent. Output is 44.1 kHz WAV.
 */
export function createVoxCpm15Backend(options: VoxCpm15BackendOptions): BackendAdapter {
  const availability = new AvailabilityCache()
  const voices = new TimedCache<string[]>(VOICES_TTL_MS)
  const resolver = new FleetHostResolver({
    explicitHost: options.host ? options.host.replace(/\/+$/, "") : null,
    fleet: options.fleet,
    probe: (host) => probeUrl(joinUrl(host, "/health")),
  })

  const hostForRequest = async (): Promise<string> => {
    const host = resolver.knownHost() ?? (await resolver.resolve()) ?? resolver.currentHost()
    if (!host) {
      throw new BackendGenerationError(NAME, "No voxcpm15 host configured.", "BACKEND_UNAVAILABLE")
    }
    return host
  }

  return {
    name: NAME,
    port: 7870,
    resourceCost: 8,

    isAvailable() {
      return availability.check(async () => (await resolver.resolve()) !== null)
    },

    async generate(request: GenerateRequest): Promise<Buffer> {
      const host = await hostForRequest()
      const voice = request.voice ? presetNameFrom(request.voice) : "default"
      log.debug({ host, voice, chars: request.text.length }, "generating")

      const response = await requestAudio(NAME, joinUrl(host, "/v1/audio/speech"), {
        json: { input: request.text, voice, model: MODEL, response_format: "wav" },
        timeoutMs: options.timeoutMs ?? 60_000,
      })
      return readAudioBody(NAME, response)
    },

    async listVoices() {
      const cached = voices.get()
      if (cached) {
        return cached
      }

      const host = resolver.currentHost()
      if (!host) {
        return FALLBACK_VOICES
      }
      try {
        const response = await fetch(joinUrl(host, "/v1/voices"), { signal: AbortSignal.timeout(5_000) })
        const parsed = voicesResponseSchema.safeParse(response.ok ? await response.json() : null)
        const list = parsed.success ? parsed.data.voices : FALLBACK_VOICES
        voices.set(list)
        return list
      } catch (error) {
        log.debug({ host, err: error }, "voice listing failed")
        return FALLBACK_VOICES
      }
    },
  }
}
