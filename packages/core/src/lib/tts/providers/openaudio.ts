import { promises as fs } from "node:fs"

import type { AudioFormat } from "../../audio/formats.js"
import { AvailabilityCache, joinUrl, probeUrl, readAudioBody, requestAudio } from "../http.js"
import { BackendGenerationError, type BackendAdapter, type GenerateRequest } from "../types.js"

const NAME = "openaudio"

export type OpenAudioBackendOptions = {
  host: string
  timeoutMs?: number
}

async function readReferenceBase64(voicePath: string): Promise<string> {
  try {
    return (await fs.readFile(voicePath)).toString("base64")
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error"
    throw new BackendGenerationError(NAME, `Could not read reference audio ${voicePath}: ${message}`)
  }
}

/**
 * Zero-shot cloning server: every request carries the reference clip and its
 * transcript inline.
 */
export function createOpenAudioBackend(options: OpenAudioBackendOptions): BackendAdapter {
  const availability = new AvailabilityCache()
  const outputFormats: readonly AudioFormat[] = ["wav", "mp3"]

  return {
    name: NAME,
    port: 9877,
    resourceCost: 5,
    outputFormats,

    isAvailable() {
      return availability.check(() => probeUrl(joinUrl(options.host, "/v1/health")))
    },

    async generate(request: GenerateRequest): Promise<Buffer> {
      const audio = await readReferenceBase64(request.voice)
      const response = await requestAudio(NAME, joinUrl(options.host, "/v1/tts"), {
        json: {
          text: request.text,
          format: outputFormats.includes(request.format) ? request.format : "wav",
          references: [{ audio, text: request.transcript }],
        },
        timeoutMs: options.timeoutMs ?? 120_000,
      })
      return readAudioBody(NAME, response)
    },
  }
}
