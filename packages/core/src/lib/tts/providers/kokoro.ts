import type { AudioFormat } from "../../audio/formats.js"
import { AvailabilityCache, joinUrl, probeUrl, readAudioBody, requestAudio } from "../http.js"
import type { BackendAdapter, GenerateRequest } from "../types.js"

const NAME = "kokoro"
const NATIVE_FORMATS: readonly AudioFormat[] = ["wav", "mp3", "opus", "flac"]

export type KokoroBackendOptions = {
  host: string
  /** Request voice (lower-case) to Kokoro voice id, OpenAI aliases included. */
  voices: ReadonlyMap<string, string>
  timeoutMs?: number
}

export function createKokoroBackend(options: KokoroBackendOptions): BackendAdapter {
  const availability = new AvailabilityCache()

  const mapVoice = (voice: string): string => {
    const key = voice.toLowerCase()
    return options.voices.get(key) ?? key
  }

  return {
    name: NAME,
    port: 8880,
    // Runs on CPU.
    resourceCost: 0,
    outputFormats: NATIVE_FORMATS,

    isAvailable() {
      return availability.check(() => probeUrl(joinUrl(options.host, "/health")))
    },

    async generate(request: GenerateRequest): Promise<Buffer> {
      const response = await requestAudio(NAME, joinUrl(options.host, "/v1/audio/speech"), {
        json: {
          model: "kokoro",
          voice: mapVoice(request.voice),
          input: request.text,
          response_format: NATIVE_FORMATS.includes(request.format) ? request.format : "wav",
        },
        timeoutMs: options.timeoutMs ?? 120_000,
      })
      return readAudioBody(NAME, response)
    },

    async listVoices() {
      return [...options.voices.keys()].sort()
    },
  }
}
