import { TtsProxyError } from "../../../../../packages/core/src/errors.js"
import { parseAudioFormat } from "../../../../../packages/core/src/lib/audio/formats.js"
import type { SpeechInput } from "../../../../../packages/core/src/features/speech/service.js"
import { requireObjectBody, requireString } from "../../shared/request/body.js"

export const MAX_GAP_MS = 5_000

export type SpeechBody = SpeechInput & {
  model: string
  speed: number
}

export function parseSpeechBody(body: unknown): SpeechBody {
  const raw = requireObjectBody(body)

  const input = requireString(raw, "input")
  const voice = requireString(raw, "voice").trim()

  const format = parseAudioFormat(typeof raw.response_format === "string" ? raw.response_format : "mp3")
  const model = typeof raw.model === "string" && raw.model.length > 0 ? raw.model : "tts-1"
  // Accepted for OpenAI compatibility; backends synthesize at their natural rate.
  const speed = typeof raw.speed === "number" ? raw.speed : 1

  let gapMs: number | null = null
  if (raw.gap_ms !== undefined && raw.gap_ms !== null) {
    if (typeof raw.gap_ms !== "number" || !Number.isInteger(raw.gap_ms) || raw.gap_ms < 0 || raw.gap_ms > MAX_GAP_MS) {
      throw new TtsProxyError(`gap_ms must be an integer between 0 and ${MAX_GAP_MS}.`, "VALIDATION_ERROR", 2, 400)
    }
    gapMs = raw.gap_ms
  }

  return { input, voice, format, model, speed, gapMs }
}
