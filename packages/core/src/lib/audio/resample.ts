import type { PcmAudio } from "./wav.js"

/**
 * Linear-interpolation resampler. Output length is `round(length * target / source)`.
 */
export function resampleLinear(audio: PcmAudio, targetRate: number): PcmAudio {
  if (!Number.isInteger(targetRate) || targetRate < 1) {
    throw new RangeError(`Invalid target sample rate: ${targetRate}`)
  }
  if (audio.sampleRate === targetRate) {
    return audio
  }

  const source = audio.samples
  const outputLength = Math.round((source.length * targetRate) / audio.sampleRate)
  const output = new Float64Array(outputLength)
  const step = audio.sampleRate / targetRate
  const last = source.length - 1

  for (let i = 0; i < outputLength; i++) {
    const position = i * step
    const index = Math.floor(position)
    if (index >= last) {
      output[i] = source[last]
      continue
    }
    const fraction = position - index
    output[i] = source[index] + (source[index + 1] - source[index]) * fraction
  }

  return {
    sampleRate: targetRate,
    sampleFormat: audio.sampleFormat,
    samples: output,
  }
}
