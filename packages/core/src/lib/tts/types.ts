import type { AudioFormat } from "../audio/formats.js"

export type GenerateRequest = {
  text: string
  /** Reference audio path for cloning backends, or a preset voice name. */
  voice: string
  /** Transcript of the reference audio; empty for preset voices. */
  transcript: string
  format: AudioFormat
}

/**
 * Capability contract every TTS backend integration satisfies. The router and the
 * speech pipeline only ever talk to backends through this interface.
 */
export interface BackendAdapter {
  /** Stable routing key, unique within a router. */
  readonly name: string
  /** Default service port, informational only (0 for cloud). */
  readonly port: number
  /** Approximate GPU memory in GB, informational only (0 for cloud or CPU). */
  readonly resourceCost: number
  /** Formats `generate` can return without conversion. Defaults to WAV only. */
  readonly outputFormats?: readonly AudioFormat[]

  /** Health probe. Resolves false instead of throwing on network failures. */
  isAvailable(): Promise<boolean>
  /** Synthesizes one chunk. Rejects with BackendGenerationError. */
  generate(request: GenerateRequest): Promise<Buffer>
  listVoices?(): Promise<string[]>
}

export type BackendGenerationErrorCode = "BACKEND_UNAVAILABLE" | "BACKEND_ERROR" | "BACKEND_TIMEOUT" | "BACKEND_BAD_PAYLOAD"

export class BackendGenerationError extends Error {
  code: BackendGenerationErrorCode
  backend: string

  constructor(backend: string, message: string, code: BackendGenerationErrorCode = "BACKEND_ERROR") {
    super(message)
    this.name = "BackendGenerationError"
    this.backend = backend
    this.code = code
  }
}

export function supportsOutputFormat(adapter: BackendAdapter, format: AudioFormat): boolean {
  return (adapter.outputFormats ?? ["wav"]).includes(format)
}
