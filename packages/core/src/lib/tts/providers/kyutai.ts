import { z } from "zod"

import type { KyutaiHost } from "../../../config.js"
import {
  FleetHostResolver,
  isAudioResponse,
  joinUrl,
  presetNameFrom,
  probeUrl,
  readAudioBody,
  requestAudio,
} from "../http.js"
import { BackendGenerationError, type BackendAdapter, type GenerateRequest } from "../types.js"

const NAME = "kyutai"
const DEFAULT_EMOTION = "default"

const audioEnvelopeSchema = z.object({ audio_url: z.string().min(1) })

export type KyutaiBackendOptions = {
  hosts: KyutaiHost[]
  /** Emotion preset names (lower-case) the server understands. */
  emotions: ReadonlyMap<string, string>
  timeoutMs?: number
}

/**
 * Emotion-preset TTS that may run on several machines; the first healthy host in
 * configuration order serves requests.
 */
export function createKyutaiBackend(options: KyutaiBackendOptions): BackendAdapter {
  const timeoutMs = options.timeoutMs ?? 30_000
  const resolver = new FleetHostResolver({
    explicitHost: null,
    fleet: options.hosts.map((host) => host.url),
    probe: (host) => probeUrl(joinUrl(host, "/")),
  })

  const emotionFor = (voice: string): string => {
    const name = presetNameFrom(voice).toLowerCase()
    return options.emotions.has(name) ? name : DEFAULT_EMOTION
  }

  const fetchEnvelopeAudio = async (host: string, response: Response): Promise<Buffer> => {
    let body: unknown
    try {
      body = await response.json()
    } catch {
      throw new BackendGenerationError(NAME, "kyutai returned neither audio nor JSON.", "BACKEND_BAD_PAYLOAD")
    }

    const envelope = audioEnvelopeSchema.safeParse(body)
    if (!envelope.success) {
      throw new BackendGenerationError(NAME, "kyutai returned no audio.", "BACKEND_BAD_PAYLOAD")
    }

    const audioUrl = /^https?:\/\//.test(envelope.data.audio_url)
      ? envelope.data.audio_url
      : joinUrl(host, envelope.data.audio_url)
    const audioResponse = await requestAudio(NAME, audioUrl, { method: "GET", timeoutMs })
    return readAudioBody(NAME, audioResponse)
  }

  return {
    name: NAME,
    port: 8899,
    resourceCost: 4,

    async isAvailable() {
      return (await resolver.resolve()) !== null
    },

    async generate(request: GenerateRequest): Promise<Buffer> {
      const host = await resolver.resolve()
      if (!host) {
        throw new BackendGenerationError(NAME, "No kyutai server available.", "BACKEND_UNAVAILABLE")
      }

      const response = await requestAudio(NAME, joinUrl(host, "/synthesize"), {
        json: { text: request.text, voice: emotionFor(request.voice), return_audio: true },
        timeoutMs,
      })

      if (isAudioResponse(response)) {
        return readAudioBody(NAME, response)
      }
      return fetchEnvelopeAudio(host, response)
    },

    async listVoices() {
      return [...options.emotions.keys()]
    },
  }
}
