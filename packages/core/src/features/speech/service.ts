import { TtsProxyError } from "../../errors.js"
import { createChildLogger } from "../../logger.js"
import { contentTypeFor, DIRECT_FORMATS, INTERMEDIATE_FORMAT, type AudioFormat } from "../../lib/audio/formats.js"
import { stitchWavBuffers, type StitchMode } from "../../lib/audio/stitch.js"
import type { AudioTranscoder } from "../../lib/audio/transcode.js"
import { WavDecodeError } from "../../lib/audio/wav.js"
import { BackendGenerationError, supportsOutputFormat, type BackendAdapter } from "../../lib/tts/types.js"
import { chunkText, countWords } from "../chunking/chunker.js"
import { getProfile, type BackendProfile } from "../profiles/profiles.js"
import type { BackendRouter } from "../routing/router.js"
import type { Voice } from "../voices/library.js"
import { findNamespace, type VoiceNamespace } from "../voices/namespaces.js"
import type { VoicePreferenceStore } from "../voices/preferences.js"

const log = createChildLogger("speech")

/** Backend that accepts any voice name when it is the preferred backend. */
export const CLOUD_BACKEND = "elevenlabs"
const VOICE_SUGGESTION_LIMIT = 10

export type VoiceCatalog = {
  get(name: string): Voice | undefined
  list(): string[]
}

export type SpeechContext = {
  router: BackendRouter
  voices: VoiceCatalog
  preferences: VoicePreferenceStore
  namespaces: VoiceNamespace[]
  transcoder: AudioTranscoder
  /** Chunks generated in parallel; 1 keeps generation sequential. */
  chunkConcurrency?: number
}

export type SpeechInput = {
  input: string
  voice: string
  format: AudioFormat
  /** Joins chunks with this much silence instead of crossfading. */
  gapMs?: number | null
}

export type ResolvedVoice = {
  backend: BackendAdapter
  /** Reference path for library voices, the request voice otherwise. */
  voice: string
  transcript: string
  source: "namespace" | "cloud" | "library"
}

export type SpeechResult = {
  audio: Buffer
  format: AudioFormat
  contentType: string
  backend: string
  chunks: number
}

async function requireAvailable(context: SpeechContext, backendName: string, voice: string): Promise<BackendAdapter> {
  const backend = context.router.getBackend(backendName)
  if (!backend || !(await backend.isAvailable())) {
    throw new TtsProxyError(
      `Backend ${backendName} is not available for voice "${voice}".`,
      "BACKEND_UNAVAILABLE",
      2,
      503,
    )
  }
  return backend
}

/**
 * Picks the backend and voice reference for a request voice. Reserved preset names
 * bind to their backend; any other voice must exist in the voice library and is
 * routed by its saved preference, then by the router.
 */
export async function resolveSpeechVoice(context: SpeechContext, voiceName: string): Promise<ResolvedVoice> {
  const namespace = findNamespace(context.namespaces, voiceName)
  if (namespace) {
    const backend = await requireAvailable(context, namespace.backend, voiceName)
    return { backend, voice: voiceName, transcript: "", source: "namespace" }
  }

  if (context.router.preferred === CLOUD_BACKEND) {
    const backend = await requireAvailable(context, CLOUD_BACKEND, voiceName)
    return { backend, voice: voiceName, transcript: "", source: "cloud" }
  }

  const voice = context.voices.get(voiceName)
  if (!voice) {
    const available = context.voices.list().slice(0, VOICE_SUGGESTION_LIMIT)
    throw new TtsProxyError(
      `Voice "${voiceName}" not found. Available: ${available.length > 0 ? available.join(", ") : "none"}.`,
      "VOICE_NOT_FOUND",
      2,
      400,
    )
  }

  const preferredName = context.preferences.get(voiceName)
  if (preferredName) {
    const preferred = context.router.getBackend(preferredName)
    if (preferred && (await preferred.isAvailable())) {
      return { backend: preferred, voice: voice.referencePath, transcript: voice.transcript, source: "library" }
    }
    log.warn({ voice: voiceName, backend: preferredName }, "preferred backend for voice not available")
  }

  const backend = await context.router.getActiveBackend()
  return { backend, voice: voice.referencePath, transcript: voice.transcript, source: "library" }
}

export function shouldChunk(profile: BackendProfile, text: string): boolean {
  return profile.needsChunking && (countWords(text) > profile.maxWords || text.length > profile.maxChars)
}

function generationFailed(backend: string, error: unknown, chunk?: { index: number; total: number }): TtsProxyError {
  if (error instanceof TtsProxyError) {
    return error
  }
  const where = chunk ? ` (chunk ${chunk.index + 1}/${chunk.total})` : ""
  const message = error instanceof Error ? error.message : "Unknown error"
  const code = error instanceof BackendGenerationError ? error.code : "INTERNAL"
  log.error({ backend, code, chunk: chunk?.index, err: error }, "generation failed")
  return new TtsProxyError(`Generation failed on ${backend}${where}: ${message}`, "GENERATION_ERROR", 1, 500)
}

/**
 * Runs `task` over every item with at most `concurrency` in flight and returns the
 * results in input order. The first rejection stops new tasks from starting.
 */
async function mapInOrder<T, R>(items: T[], concurrency: number, task: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0
  let failed = false

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next
      next += 1
      try {
        results[index] = await task(items[index], index)
      } catch (error) {
        failed = true
        throw error
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker())
  await Promise.all(workers)
  return results
}

async function transcodeIfNeeded(context: SpeechContext, audio: Buffer, from: AudioFormat, to: AudioFormat): Promise<Buffer> {
  if (from === to) {
    return audio
  }
  try {
    return await context.transcoder.transcode(audio, to)
  } catch (error) {
    if (error instanceof TtsProxyError) {
      throw error
    }
    const message = error instanceof Error ? error.message : "Unknown error"
    throw new TtsProxyError(`Transcoding to ${to} failed: ${message}`, "TRANSCODE_ERROR", 1, 500)
  }
}

async function generateDirect(context: SpeechContext, resolved: ResolvedVoice, input: SpeechInput): Promise<SpeechResult> {
  const { backend } = resolved
  const nativeFormat: AudioFormat =
    DIRECT_FORMATS.has(input.format) && supportsOutputFormat(backend, input.format) ? input.format : INTERMEDIATE_FORMAT

  let audio: Buffer
  try {
    audio = await backend.generate({
      text: input.input,
      voice: resolved.voice,
      transcript: resolved.transcript,
      format: nativeFormat,
    })
  } catch (error) {
    throw generationFailed(backend.name, error)
  }

  return {
    audio: await transcodeIfNeeded(context, audio, nativeFormat, input.format),
    format: input.format,
    contentType: contentTypeFor(input.format),
    backend: backend.name,
    chunks: 1,
  }
}

async function generateChunked(
  context: SpeechContext,
  resolved: ResolvedVoice,
  input: SpeechInput,
  profile: BackendProfile,
): Promise<SpeechResult> {
  const { backend } = resolved
  const chunks = chunkText(input.input, profile)
  log.info({ backend: backend.name, chunks: chunks.length, words: countWords(input.input) }, "chunked request")

  const audioChunks = await mapInOrder(chunks, context.chunkConcurrency ?? 1, async (text, index) => {
    try {
      return await backend.generate({
        text,
        voice: resolved.voice,
        transcript: resolved.transcript,
        format: INTERMEDIATE_FORMAT,
      })
    } catch (error) {
      throw generationFailed(backend.name, error, { index, total: chunks.length })
    }
  })

  const mode: StitchMode =
    input.gapMs !== undefined && input.gapMs !== null
      ? { mode: "gaps", gapMs: input.gapMs }
      : { mode: "crossfade", crossfadeMs: profile.crossfadeMs }

  let stitched: Buffer
  try {
    stitched = stitchWavBuffers(audioChunks, mode)
  } catch (error) {
    if (error instanceof WavDecodeError) {
      throw new TtsProxyError(
        `Backend ${backend.name} returned audio that could not be stitched: ${error.message}`,
        "GENERATION_ERROR",
        1,
        500,
      )
    }
    throw error
  }

  return {
    audio: await transcodeIfNeeded(context, stitched, INTERMEDIATE_FORMAT, input.format),
    format: input.format,
    contentType: contentTypeFor(input.format),
    backend: backend.name,
    chunks: chunks.length,
  }
}

export async function synthesizeSpeech(context: SpeechContext, input: SpeechInput): Promise<SpeechResult> {
  if (input.input.trim().length === 0) {
    throw new TtsProxyError("Input text cannot be empty.", "VALIDATION_ERROR", 2, 400)
  }

  const resolved = await resolveSpeechVoice(context, input.voice)
  const profile = getProfile(resolved.backend.name)

  log.info(
    { backend: resolved.backend.name, voice: input.voice, source: resolved.source, format: input.format },
    "synthesizing speech",
  )

  return shouldChunk(profile, input.input)
    ? generateChunked(context, resolved, input, profile)
    : generateDirect(context, resolved, input)
}
