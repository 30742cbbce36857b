import { AvailabilityCache, joinUrl, modelLoaded, presetNameFrom, probeUrl, readAudioBody, requestAudio } from "../http.js"
import type { BackendAdapter, GenerateRequest } from "../types.js"

const NAME = "vibevoice"
const MODEL = "vibevoice-realtime-0.5b"

export type VibeVoiceBackendOptions = {
  host: string
  /** Lower-case preset name to the server's speaker id. */
  voices: ReadonlyMap<string, string>
  timeoutMs?: number
}

function capitalize(value: string): string {
  return value.length === 0 ? value : `${value[0].toUpperCase()}${value.slice(1)}`
}

export function createVibeVoiceBackend(options: VibeVoiceBackendOptions): BackendAdapter {
  const availability = new AvailabilityCache()

  const speakerFor = (voice: string): string => {
    const name = presetNameFrom(voice)
    return options.voices.has(name.toLowerCase()) ? capitalize(name.toLowerCase()) : name
  }

  return {
    name: NAME,
    port: 8086,
    resourceCost: 2,

    isAvailable() {
      return availability.check(() =>
        probeUrl(joinUrl(options.host, "/health"), { accept: modelLoaded }),
      )
    },

    async generate(request: GenerateRequest): Promise<Buffer> {
      const response = await requestAudio(NAME, joinUrl(options.host, "/v1/audio/speech"), {
        json: {
          input: request.text,
          voice: speakerFor(request.voice),
          model: MODEL,
          response_format: "wav",
        },
        timeoutMs: options.timeoutMs ?? 120_000,
      })
      return readAudioBody(NAME, response)
    },

    async listVoices() {
      return [...options.voices.keys()]
    },
  }
}
