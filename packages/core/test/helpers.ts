import fs from "node:fs"
import os from "node:os"
import path from "node:path"

import { vi } from "vitest"

import type { AudioFormat } from "../src/lib/audio/formats.js"
import type { AudioTranscoder } from "../src/lib/audio/transcode.js"
import { encodeWav } from "../src/lib/audio/wav.js"
import type { BackendAdapter, GenerateRequest } from "../src/lib/tts/types.js"

/** Mono 16-bit WAV holding `length` copies of `value`. */
export function constantWav(length: number, value = 1000, sampleRate = 1000): Buffer {
  return encodeWav({ sampleRate, sampleFormat: "s16", samples: new Float64Array(length).fill(value) })
}

export type FakeBackendOptions = {
  name: string
  available?: boolean
  port?: number
  resourceCost?: number
  outputFormats?: readonly AudioFormat[]
  generate?: (request: GenerateRequest) => Promise<Buffer>
  voices?: string[]
}

export class FakeBackend implements BackendAdapter {
  readonly name: string
  readonly port: number
  readonly resourceCost: number
  readonly outputFormats?: readonly AudioFormat[]
  available: boolean
  availabilityChecks = 0
  readonly requests: GenerateRequest[] = []
  private readonly generateImpl: (request: GenerateRequest) => Promise<Buffer>
  private readonly voices?: string[]

  constructor(options: FakeBackendOptions) {
    this.name = options.name
    this.port = options.port ?? 9000
    this.resourceCost = options.resourceCost ?? 1
    this.outputFormats = options.outputFormats
    this.available = options.available ?? true
    this.generateImpl = options.generate ?? (async () => constantWav(100))
    this.voices = options.voices
  }

  async isAvailable(): Promise<boolean> {
    this.availabilityChecks += 1
    return this.available
  }

  async generate(request: GenerateRequest): Promise<Buffer> {
    this.requests.push(request)
    return this.generateImpl(request)
  }

  async listVoices(): Promise<string[]> {
    return this.voices ?? []
  }
}

export class RecordingTranscoder implements AudioTranscoder {
  readonly calls: Array<{ inputBytes: number; target: AudioFormat }> = []

  async transcode(input: Buffer, target: AudioFormat): Promise<Buffer> {
    this.calls.push({ inputBytes: input.length, target })
    return Buffer.from(`${target}:${input.length}`)
  }
}

export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

/** Writes `<voiceDir>/<name>/reference.wav` and `transcript.txt`. */
export function writeVoice(voiceDir: string, name: string, transcript = `Hello from ${name}.`): string {
  const directory = path.join(voiceDir, name)
  fs.mkdirSync(directory, { recursive: true })
  const referencePath = path.join(directory, "reference.wav")
  fs.writeFileSync(referencePath, constantWav(10))
  fs.writeFileSync(path.join(directory, "transcript.txt"), `${transcript}\n`)
  return referencePath
}

/** Writes an executable shell script and returns its path. */
export function writeScript(dir: string, name: string, body: string): string {
  const scriptPath = path.join(dir, name)
  fs.writeFileSync(scriptPath, `#!/bin/sh\n${body}\n`)
  fs.chmodSync(scriptPath, 0o755)
  return scriptPath
}

export type RecordedRequest = {
  url: string
  method: string
  headers: Headers
  body: unknown
}

/**
 * Replaces global fetch with `handler` and records every call. JSON bodies are
 * parsed; other bodies are kept as-is.
 */
export function stubFetch(handler: (url: string, init: RequestInit | undefined) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = []
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : init?.body
    requests.push({ url, method: init?.method ?? "GET", headers: new Headers(init?.headers), body })
    return handler(url, init)
  })
  vi.stubGlobal("fetch", fetchMock)
  return { requests, fetchMock }
}

export function jsonResponse(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), { status, headers: { "content-type": "application/json" } })
}

export function audioResponse(audio: Buffer | string, contentType = "audio/wav"): Response {
  return new Response(audio, { status: 200, headers: { "content-type": contentType } })
}
