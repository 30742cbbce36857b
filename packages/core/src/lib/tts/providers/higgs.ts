import { z } from "zod"

import { createChildLogger } from "../../../logger.js"
import {
  AvailabilityCache,
  joinUrl,
  modelLoaded,
  presetNameFrom,
  probeUrl,
  readAudioBody,
  requestAudio,
  TimedCache,
} from "../http.js"
import type { BackendAdapter, GenerateRequest } from "../types.js"

const NAME = "higgs"
const CHARACTERS_TTL_MS = 30_000

const log = createChildLogger("higgs")

const charactersResponseSchema = z.object({
  characters: z.array(z.object({ name: z.string() }).passthrough()).default([]),
})

export type HiggsCharacter = z.infer<typeof charactersResponseSchema>["characters"][number]

export type HiggsBackendOptions = {
  host: string
  timeoutMs?: number
  now?: () => number
}

/**
 * Generative voices: the server owns named characters designed from a scene
 * description, so requests only carry the character name.
 */
export function createHiggsBackend(options: HiggsBackendOptions): BackendAdapter {
  const availability = new AvailabilityCache()
  const characters = new TimedCache<Map<string, HiggsCharacter>>(CHARACTERS_TTL_MS, options.now)

  const fetchCharacters = async (): Promise<Map<string, HiggsCharacter>> => {
    const cached = characters.get()
    if (cached) {
      return cached
    }

    try {
      const response = await fetch(joinUrl(options.host, "/v1/characters"), {
        signal: AbortSignal.timeout(5_000),
      })
      if (!response.ok) {
        return new Map()
      }
      const parsed = charactersResponseSchema.safeParse(await response.json())
      if (!parsed.success) {
        log.warn({ issues: parsed.error.issues.length }, "unexpected characters payload")
        return new Map()
      }
      const byName = new Map(parsed.data.characters.map((character) => [character.name, character]))
      characters.set(byName)
      return byName
    } catch (error) {
      log.debug({ err: error }, "character listing failed")
      return new Map()
    }
  }

  return {
    name: NAME,
    port: 8085,
    resourceCost: 15,

    isAvailable() {
      return availability.check(() =>
        probeUrl(joinUrl(options.host, "/health"), { accept: modelLoaded }),
      )
    },

    async generate(request: GenerateRequest): Promise<Buffer> {
      const response = await requestAudio(NAME, joinUrl(options.host, "/v1/audio/speech"), {
        json: { input: request.text, voice: presetNameFrom(request.voice) },
        timeoutMs: options.timeoutMs ?? 120_000,
      })
      return readAudioBody(NAME, response)
    },

    async listVoices() {
      return [...(await fetchCharacters()).keys()]
    },
  }
}
