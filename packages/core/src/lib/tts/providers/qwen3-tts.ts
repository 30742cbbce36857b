import { z } from "zod"

import { createChildLogger } from "../../../logger.js"
import {
  AvailabilityCache,
  joinUrl,
  presetNameFrom,
  probeUrl,
  readAudioBody,
  requestAudio,
  TimedCache,
} from "../http.js"
import type { BackendAdapter, GenerateRequest } from "../types.js"

const NAME = "qwen3_tts"
const MODEL = "qwen3-tts"
const DEFAULT_VOICE = "jenny"
const FALLBACK_VOICES = [DEFAULT_VOICE, "default"]
const VOICES_TTL_MS = 300_000

const log = createChildLogger("qwen3-tts")

const voicesResponseSchema = z.object({ voices: z.array(z.string()) })

export type Qwen3TtsBackendOptions = {
  host: string
  timeoutMs?: number
}

export function createQwen3TtsBackend(options: Qwen3TtsBackendOptions): BackendAdapter {
  const host = options.host.replace(/\/+$/, "")
  const availability = new AvailabilityCache()
  const voices = new TimedCache<string[]>(VOICES_TTL_MS)

  return {
    name: NAME,
    port: 7871,
    resourceCost: 8,

    isAvailable() {
      return availability.check(() => probeUrl(joinUrl(host, "/health"), { timeoutMs: 3_000 }))
    },

    async generate(request: GenerateRequest): Promise<Buffer> {
      const voice = request.voice ? presetNameFrom(request.voice) : DEFAULT_VOICE
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
      try {
        const response = await fetch(joinUrl(host, "/v1/voices"), { signal: AbortSignal.timeout(5_000) })
        const parsed = voicesResponseSchema.safeParse(response.ok ? await response.json() : null)
        const list = parsed.success ? parsed.data.voices : FALLBACK_VOICES
        voices.set(list)
        return list
      } catch (error) {
        log.debug({ err: error }, "voice listing failed")
        return FALLBACK_VOICES
      }
    },
  }
}
