import { TtsProxyError } from "../../errors.js"

export const AUDIO_FORMATS = ["mp3", "opus", "aac", "flac", "wav", "pcm"] as const

export type AudioFormat = (typeof AUDIO_FORMATS)[number]

// Lossless container used between generation, stitching and transcoding.
export const INTERMEDIATE_FORMAT: AudioFormat = "wav"

// Formats most backends can emit natively for single-call requests.
export const DIRECT_FORMATS: ReadonlySet<AudioFormat> = new Set<AudioFormat>(["wav", "mp3"])

const CONTENT_TYPES: Record<AudioFormat, string> = {
  mp3: "audio/mpeg",
  opus: "audio/opus",
  aac: "audio/aac",
  flac: "audio/flac",
  wav: "audio/wav",
  pcm: "audio/pcm",
}

export function contentTypeFor(format: AudioFormat): string {
  return CONTENT_TYPES[format]
}

export function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.some((format) => format === value)
}

export function parseAudioFormat(value: string): AudioFormat {
  const normalized = value.trim().toLowerCase()
  if (!isAudioFormat(normalized)) {
    throw new TtsProxyError(
      `Invalid response_format. Use one of ${AUDIO_FORMATS.join(", ")}.`,
      "VALIDATION_ERROR",
      2,
      400,
    )
  }
  return normalized
}

/**
 * Guesses a container from magic bytes. Unknown payloads are treated as WAV.
 */
export function sniffAudioFormat(audio: Buffer): "wav" | "mp3" | "flac" | "ogg" {
  if (audio.length >= 4 && audio.toString("ascii", 0, 4) === "RIFF") {
    return "wav"
  }
  if (audio.length >= 4 && audio.toString("ascii", 0, 4) === "fLaC") {
    return "flac"
  }
  if (audio.length >= 4 && audio.toString("ascii", 0, 4) === "OggS") {
    return "ogg"
  }
  if (audio.length >= 3 && audio.toString("ascii", 0, 3) === "ID3") {
    return "mp3"
  }
  if (audio.length >= 2 && audio[0] === 0xff && (audio[1] & 0xe0) === 0xe0) {
    return "mp3"
  }
  return "wav"
}
