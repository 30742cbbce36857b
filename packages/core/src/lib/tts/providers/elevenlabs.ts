import type { AudioFormat } from "../../audio/formats.js"
import { wrapPcm16 } from "../../audio/wav.js"
import { AvailabilityCache, joinUrl, probeUrl, readAudioBody, requestAudio } from "../http.js"
import type { BackendAdapter, GenerateRequest } from "../types.js"

const NAME = "elevenlabs"
export const ELEVENLABS_API_URL = "https://api.elevenlabs.io/v1"
const MODEL_ID = "eleven_monolingual_v1"
const DEFAULT_VOICE = "adam"
const PCM_SAMPLE_RATE = 24_000

export type ElevenLabsBackendOptions = {
  apiKey: string
  /** Lower-case premade voice name to voice id. */
  voices: ReadonlyMap<string, string>
  apiUrl?: string
  timeoutMs?: number
}

function looksLikeVoiceId(voice: string): boolean {
  return voice.length > 15 && /^[A-Za-z0-9]+$/.test(voice)
}

/**
 * Cloud fallback. Accepts raw voice ids, premade voice names, or anything else
 * (which falls back to the default voice).
 */
export function createElevenLabsBackend(options: ElevenLabsBackendOptions): BackendAdapter {
  const apiUrl = options.apiUrl ?? ELEVENLABS_API_URL
  const availability = new AvailabilityCache()
  const outputFormats: readonly AudioFormat[] = ["mp3", "wav"]

  const resolveVoiceId = (voice: string): string => {
    if (looksLikeVoiceId(voice)) {
      return voice
    }
    return options.voices.get(voice.toLowerCase()) ?? options.voices.get(DEFAULT_VOICE) ?? voice
  }

  return {
    name: NAME,
    port: 0,
    resourceCost: 0,
    outputFormats,

    async isAvailable() {
      if (!options.apiKey) {
        return false
      }
      return availability.check(() =>
        probeUrl(joinUrl(apiUrl, "/user"), {
          headers: { "xi-api-key": options.apiKey },
          timeoutMs: 5_000,
        }),
      )
    },

    async generate(request: GenerateRequest): Promise<Buffer> {
      const voiceId = resolveVoiceId(request.voice || DEFAULT_VOICE)
      const wantsMp3 = request.format === "mp3"
      const outputFormat = wantsMp3 ? "mp3_44100_128" : `pcm_${PCM_SAMPLE_RATE}`

      const response = await requestAudio(
        NAME,
        `${joinUrl(apiUrl, `/text-to-speech/${encodeURIComponent(voiceId)}`)}?output_format=${outputFormat}`,
        {
          headers: { "xi-api-key": options.apiKey },
          json: {
            text: request.text,
            model_id: MODEL_ID,
            voice_settings: { stability: 0.5, similarity_boost: 0.75 },
          },
          timeoutMs: options.timeoutMs ?? 60_000,
        },
      )

      const audio = await readAudioBody(NAME, response)
      return wantsMp3 ? audio : wrapPcm16(audio, PCM_SAMPLE_RATE)
    },

    async listVoices() {
      return [...options.voices.keys()]
    },
  }
}
