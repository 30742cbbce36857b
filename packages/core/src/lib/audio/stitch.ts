import { createChildLogger } from "../../logger.js"
import { resampleLinear } from "./resample.js"
import { clampSample, decodeWav, encodeWav, fullScale, type PcmAudio, type SampleFormat } from "./wav.js"

const log = createChildLogger("stitcher")

/** Fraction of full scale every chunk peak is scaled to. */
export const NORMALIZE_TARGET_PEAK = 0.9
export const DEFAULT_CROSSFADE_MS = 50
export const DEFAULT_GAP_MS = 200

export type StitchMode =
  | { mode: "crossfade"; crossfadeMs: number }
  | { mode: "gaps"; gapMs: number }

function peakOf(samples: Float64Array): number {
  let peak = 0
  for (let i = 0; i < samples.length; i++) {
    const magnitude = Math.abs(samples[i])
    if (magnitude > peak) {
      peak = magnitude
    }
  }
  return peak
}

function msToSamples(ms: number, sampleRate: number): number {
  return Math.floor((ms * sampleRate) / 1000)
}

/** `count` evenly spaced values from start to stop inclusive; a single value is `start`. */
function linearRamp(start: number, stop: number, count: number): Float64Array {
  const ramp = new Float64Array(count)
  if (count === 1) {
    ramp[0] = start
    return ramp
  }
  const step = (stop - start) / (count - 1)
  for (let i = 0; i < count; i++) {
    ramp[i] = start + step * i
  }
  return ramp
}

function concatSamples(...parts: Float64Array[]): Float64Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0)
  const output = new Float64Array(total)
  let offset = 0
  for (const part of parts) {
    output.set(part, offset)
    offset += part.length
  }
  return output
}

/**
 * Rescales samples so the peak reaches `targetPeak` of the format's full scale.
 * Silent audio is returned as-is.
 */
export function normalizePeak(audio: PcmAudio, targetPeak = NORMALIZE_TARGET_PEAK): PcmAudio {
  const peak = peakOf(audio.samples)
  if (peak === 0) {
    return audio
  }

  const factor = (targetPeak * fullScale(audio.sampleFormat)) / peak
  const samples = new Float64Array(audio.samples.length)
  for (let i = 0; i < samples.length; i++) {
    samples[i] = clampSample(audio.samples[i] * factor, audio.sampleFormat)
  }

  return { sampleRate: audio.sampleRate, sampleFormat: audio.sampleFormat, samples }
}

export function convertSampleFormat(audio: PcmAudio, format: SampleFormat): PcmAudio {
  if (audio.sampleFormat === format) {
    return audio
  }

  const ratio = fullScale(format) / fullScale(audio.sampleFormat)
  const samples = new Float64Array(audio.samples.length)
  for (let i = 0; i < samples.length; i++) {
    samples[i] = clampSample(audio.samples[i] * ratio, format)
  }
  return { sampleRate: audio.sampleRate, sampleFormat: format, samples }
}

// Brings `next` to the running result's rate and sample format.
function conform(next: PcmAudio, reference: PcmAudio): PcmAudio {
  let conformed = next
  if (conformed.sampleRate !== reference.sampleRate) {
    log.debug(
      { from: conformed.sampleRate, to: reference.sampleRate },
      "resampling chunk before merge",
    )
    conformed = resampleLinear(conformed, reference.sampleRate)
  }
  return convertSampleFormat(conformed, reference.sampleFormat)
}

/**
 * Joins two buffers of the same rate, blending `crossfadeMs` of a's tail into b's head.
 * The overlap is capped by both lengths; a zero overlap is a plain concatenation.
 */
export function crossfade(a: PcmAudio, b: PcmAudio, crossfadeMs: number): PcmAudio {
  const overlap = Math.min(
    msToSamples(crossfadeMs, a.sampleRate),
    a.samples.length,
    b.samples.length,
  )

  if (overlap <= 0) {
    return {
      sampleRate: a.sampleRate,
      sampleFormat: a.sampleFormat,
      samples: concatSamples(a.samples, b.samples),
    }
  }

  const fadeOut = linearRamp(1, 0, overlap)
  const fadeIn = linearRamp(0, 1, overlap)
  const tailStart = a.samples.length - overlap
  const blended = new Float64Array(overlap)

  for (let i = 0; i < overlap; i++) {
    blended[i] = clampSample(
      a.samples[tailStart + i] * fadeOut[i] + b.samples[i] * fadeIn[i],
      a.sampleFormat,
    )
  }

  return {
    sampleRate: a.sampleRate,
    sampleFormat: a.sampleFormat,
    samples: concatSamples(a.samples.subarray(0, tailStart), blended, b.samples.subarray(overlap)),
  }
}

/**
 * Normalizes every chunk, then merges left to right with linear crossfades.
 * Returns null for an empty chunk list.
 */
export function stitchAudio(chunks: PcmAudio[], crossfadeMs = DEFAULT_CROSSFADE_MS): PcmAudio | null {
  const [first, ...rest] = chunks.map((chunk) => normalizePeak(chunk))
  if (!first) {
    return null
  }
  if (rest.length > 0) {
    log.info({ chunks: chunks.length, crossfadeMs }, "stitching chunks")
  }

  let result = first
  for (const chunk of rest) {
    result = crossfade(result, conform(chunk, result), crossfadeMs)
  }
  return result
}

/**
 * Dialogue-style join: normalized chunks separated by `gapMs` of silence.
 */
export function stitchWithGaps(chunks: PcmAudio[], gapMs = DEFAULT_GAP_MS): PcmAudio | null {
  const [first, ...rest] = chunks.map((chunk) => normalizePeak(chunk))
  if (!first) {
    return null
  }

  const silence = new Float64Array(Math.max(0, msToSamples(gapMs, first.sampleRate)))
  const parts: Float64Array[] = [first.samples]
  for (const chunk of rest) {
    parts.push(silence, conform(chunk, first).samples)
  }

  return {
    sampleRate: first.sampleRate,
    sampleFormat: first.sampleFormat,
    samples: concatSamples(...parts),
  }
}

/**
 * Byte-level entry point: decodes WAV chunks, stitches them and re-encodes WAV.
 * An empty list yields an empty buffer.
 */
export function stitchWavBuffers(buffers: Buffer[], mode: StitchMode): Buffer {
  const decoded = buffers.map((buffer) => decodeWav(buffer))
  const stitched =
    mode.mode === "crossfade"
      ? stitchAudio(decoded, mode.crossfadeMs)
      : stitchWithGaps(decoded, mode.gapMs)

  return stitched ? encodeWav(stitched) : Buffer.alloc(0)
}
