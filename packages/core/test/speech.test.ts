import { describe, expect, it } from "vitest"

import { BackendRouter } from "../src/features/routing/router.js"
import { resolveSpeechVoice, synthesizeSpeech, type SpeechContext, type VoiceCatalog } from "../src/features/speech/service.js"
import type { Voice } from "../src/features/voices/library.js"
import { parseVoiceNamespaces } from "../src/features/voices/namespaces.js"
import { InMemoryVoicePreferenceStore } from "../src/features/voices/preferences.js"
import type { AudioTranscoder } from "../src/lib/audio/transcode.js"
import { decodeWav, encodeWav } from "../src/lib/audio/wav.js"
import { BackendGenerationError } from "../src/lib/tts/types.js"
import { constantWav, FakeBackend, RecordingTranscoder } from "./helpers.js"

const LIBRARY: Voice[] = [
  { name: "alice", referencePath: "/voices/alice/reference.wav", transcript: "Alice here." },
  { name: "bob", referencePath: "/voices/bob/reference.wav", transcript: "Bob here." },
]

function catalog(voices: Voice[] = LIBRARY): VoiceCatalog {
  const byName = new Map(voices.map((voice) => [voice.name, voice]))
  return {
    get: (name) => byName.get(name),
    list: () => [...byName.keys()].sort(),
  }
}

function createContext(
  backends: FakeBackend[],
  options: {
    preferences?: Record<string, string>
    transcoder?: AudioTranscoder
    chunkConcurrency?: number
    preferred?: string
  } = {},
): SpeechContext {
  const router = new BackendRouter(backends)
  if (options.preferred) {
    router.setPreferred(options.preferred)
  }
  return {
    router,
    voices: catalog(),
    preferences: new InMemoryVoicePreferenceStore(options.preferences),
    namespaces: parseVoiceNamespaces({
      namespaces: [{ backend: "kokoro", voices: { alloy: "af_alloy" } }],
    }),
    transcoder: options.transcoder ?? new RecordingTranscoder(),
    chunkConcurrency: options.chunkConcurrency,
  }
}

/** A 30-word sentence that starts with `label`. */
function sentence(label: string): string {
  return `${label} ${Array.from({ length: 28 }, (_, i) => `w${i}`).join(" ")} end.`
}

const THREE_SENTENCES = [sentence("alpha"), sentence("bravo"), sentence("charlie")].join(" ")

describe("resolveSpeechVoice", () => {
  it("routes reserved voices to their backend", async () => {
    const kokoro = new FakeBackend({ name: "kokoro" })
    const context = createContext([new FakeBackend({ name: "openaudio" }), kokoro])

    const resolved = await resolveSpeechVoice(context, "Alloy")

    expect(resolved).toEqual({ backend: kokoro, voice: "Alloy", transcript: "", source: "namespace" })
  })

  it("returns 503 when a reserved voice's backend is down", async () => {
    const context = createContext([new FakeBackend({ name: "openaudio" }), new FakeBackend({ name: "kokoro", available: false })])

    await expect(resolveSpeechVoice(context, "alloy")).rejects.toMatchObject({
      code: "BACKEND_UNAVAILABLE",
      httpStatus: 503,
      message: 'Backend kokoro is not available for voice "alloy".',
    })
  })

  it("passes any voice to the cloud backend when it is preferred", async () => {
    const cloud = new FakeBackend({ name: "elevenlabs" })
    const context = createContext([new FakeBackend({ name: "openaudio" }), cloud], { preferred: "elevenlabs" })

    expect(await resolveSpeechVoice(context, "Rachel-Custom")).toMatchObject({
      backend: cloud,
      voice: "Rachel-Custom",
      source: "cloud",
    })
  })

  it("rejects voices missing from the library", async () => {
    const context = createContext([new FakeBackend({ name: "openaudio" })])

    await expect(resolveSpeechVoice(context, "ghost")).rejects.toMatchObject({
      code: "VOICE_NOT_FOUND",
      httpStatus: 400,
      message: 'Voice "ghost" not found. Available: alice, bob.',
    })
  })

  it("sends the reference path and transcript for library voices", async () => {
    const openaudio = new FakeBackend({ name: "openaudio" })

    expect(await resolveSpeechVoice(createContext([openaudio]), "alice")).toEqual({
      backend: openaudio,
      voice: "/voices/alice/reference.wav",
      transcript: "Alice here.",
      source: "library",
    })
  })

  it("honours a per-voice preference while that backend is up", async () => {
    const openaudio = new FakeBackend({ name: "openaudio" })
    const higgs = new FakeBackend({ name: "higgs" })
    const context = createContext([openaudio, higgs], { preferences: { Alice: "higgs" } })

    expect((await resolveSpeechVoice(context, "alice")).backend).toBe(higgs)
    expect((await resolveSpeechVoice(context, "bob")).backend).toBe(openaudio)

    higgs.available = false
    expect((await resolveSpeechVoice(context, "alice")).backend).toBe(openaudio)
  })

  it("fails with 503 when no backend is available", async () => {
    const context = createContext([new FakeBackend({ name: "openaudio", available: false })])

    await expect(resolveSpeechVoice(context, "alice")).rejects.toMatchObject({
      code: "NO_BACKEND_AVAILABLE",
      httpStatus: 503,
    })
  })
})

describe("synthesizeSpeech", () => {
  it("rejects empty input before touching a backend", async () => {
    const backend = new FakeBackend({ name: "openaudio" })

    await expect(synthesizeSpeech(createContext([backend]), { input: "  ", voice: "alice", format: "mp3" })).rejects.toMatchObject({
      code: "VALIDATION_ERROR",
      httpStatus: 400,
    })
    expect(backend.availabilityChecks).toBe(0)
  })

  it("returns native audio when the backend can produce the format", async () => {
    const backend = new FakeBackend({
      name: "openaudio",
      outputFormats: ["wav", "mp3"],
      generate: async () => Buffer.from("ID3native"),
    })
    const transcoder = new RecordingTranscoder()

    const result = await synthesizeSpeech(createContext([backend], { transcoder }), {
      input: "Hello world.",
      voice: "alice",
      format: "mp3",
    })

    expect(result).toEqual({
      audio: Buffer.from("ID3native"),
      format: "mp3",
      contentType: "audio/mpeg",
      backend: "openaudio",
      chunks: 1,
    })
    expect(backend.requests).toEqual([
      { text: "Hello world.", voice: "/voices/alice/reference.wav", transcript: "Alice here.", format: "mp3" },
    ])
    expect(transcoder.calls).toEqual([])
  })

  it("generates WAV and transcodes other formats", async () => {
    const wav = constantWav(10)
    const backend = new FakeBackend({ name: "kokoro", outputFormats: ["wav", "mp3", "opus"], generate: async () => wav })
    const transcoder = new RecordingTranscoder()

    const result = await synthesizeSpeech(createContext([backend], { transcoder }), {
      input: "Hello world.",
      voice: "alloy",
      format: "opus",
    })

    expect(backend.requests[0].format).toBe("wav")
    expect(transcoder.calls).toEqual([{ inputBytes: wav.length, target: "opus" }])
    expect(result.audio.toString()).toBe(`opus:${wav.length}`)
    expect(result.contentType).toBe("audio/opus")
  })

  it("splits long text, generates chunks in order and crossfades them", async () => {
    const backend = new FakeBackend({ name: "kyutai", generate: async () => constantWav(1000) })

    const result = await synthesizeSpeech(createContext([backend]), {
      input: THREE_SENTENCES,
      voice: "alice",
      format: "wav",
    })

    expect(result.chunks).toBe(3)
    expect(backend.requests.map((request) => request.text.split(" ")[0])).toEqual(["alpha", "bravo", "charlie"])
    expect(backend.requests.every((request) => request.format === "wav")).toBe(true)
    // kyutai crossfades 30 ms, i.e. 30 samples at 1 kHz, at each of the two joins.
    expect(decodeWav(result.audio).samples.length).toBe(3000 - 2 * 30)
  })

  it("joins chunks with silence when a gap is requested", async () => {
    const backend = new FakeBackend({ name: "kyutai", generate: async () => constantWav(1000) })

    const result = await synthesizeSpeech(createContext([backend]), {
      input: THREE_SENTENCES,
      voice: "alice",
      format: "wav",
      gapMs: 100,
    })

    expect(decodeWav(result.audio).samples.length).toBe(3000 + 2 * 100)
  })

  it("transcodes the stitched audio once", async () => {
    const transcoder = new RecordingTranscoder()
    const backend = new FakeBackend({ name: "kyutai", generate: async () => constantWav(1000) })

    const result = await synthesizeSpeech(createContext([backend], { transcoder }), {
      input: THREE_SENTENCES,
      voice: "alice",
      format: "mp3",
    })

    expect(transcoder.calls).toEqual([{ inputBytes: 44 + 2940 * 2, target: "mp3" }])
    expect(result.format).toBe("mp3")
  })

  it("never chunks for backends that take long text", async () => {
    const backend = new FakeBackend({ name: "elevenlabs", outputFormats: ["mp3", "wav"], generate: async () => Buffer.from("ID3") })

    const result = await synthesizeSpeech(createContext([backend], { preferred: "elevenlabs" }), {
      input: THREE_SENTENCES,
      voice: "Rachel",
      format: "mp3",
    })

    expect(result.chunks).toBe(1)
    expect(backend.requests).toHaveLength(1)
  })

  it("aborts on the first failed chunk", async () => {
    const backend = new FakeBackend({
      name: "kyutai",
      generate: async (request) => {
        if (request.text.startsWith("bravo")) {
          throw new BackendGenerationError("kyutai", "model crashed")
        }
        return constantWav(100)
      },
    })

    await expect(
      synthesizeSpeech(createContext([backend]), { input: THREE_SENTENCES, voice: "alice", format: "wav" }),
    ).rejects.toMatchObject({
      code: "GENERATION_ERROR",
      httpStatus: 500,
      message: "Generation failed on kyutai (chunk 2/3): model crashed",
    })
    expect(backend.requests).toHaveLength(2)
  })

  it("keeps chunk order when generating in parallel", async () => {
    let inFlight = 0
    let maxInFlight = 0
    const impulse = encodeWav({ sampleRate: 1000, sampleFormat: "s16", samples: Float64Array.from([1000, 0, 0, 0]) })
    const backend = new FakeBackend({
      name: "kyutai",
      generate: async (request) => {
        inFlight += 1
        maxInFlight = Math.max(maxInFlight, inFlight)
        const first = request.text.startsWith("alpha")
        await new Promise((resolve) => setTimeout(resolve, first ? 40 : 5))
        inFlight -= 1
        return first ? impulse : constantWav(4)
      },
    })

    const result = await synthesizeSpeech(createContext([backend], { chunkConcurrency: 2 }), {
      input: THREE_SENTENCES,
      voice: "alice",
      format: "wav",
      gapMs: 0,
    })

    expect(maxInFlight).toBe(2)
    expect(Array.from(decodeWav(result.audio).samples)).toEqual([
      29490, 0, 0, 0, 29490, 29490, 29490, 29490, 29490, 29490, 29490, 29490,
    ])
  })

  it("reports audio that cannot be stitched", async () => {
    const backend = new FakeBackend({ name: "kyutai", generate: async () => Buffer.from("ID3 not a wave file at all") })

    await expect(
      synthesizeSpeech(createContext([backend]), { input: THREE_SENTENCES, voice: "alice", format: "wav" }),
    ).rejects.toMatchObject({
      code: "GENERATION_ERROR",
      message: "Backend kyutai returned audio that could not be stitched: Audio payload is not a RIFF/WAVE file.",
    })
  })

  it("maps transcoder failures", async () => {
    const backend = new FakeBackend({ name: "openaudio", generate: async () => constantWav(10) })
    const transcoder: AudioTranscoder = {
      transcode: async () => {
        throw new Error("disk full")
      },
    }

    await expect(
      synthesizeSpeech(createContext([backend], { transcoder }), { input: "Hi.", voice: "alice", format: "flac" }),
    ).rejects.toMatchObject({ code: "TRANSCODE_ERROR", message: "Transcoding to flac failed: disk full" })
  })
})
