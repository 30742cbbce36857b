export type SampleFormat = "s16" | "s24" | "s32" | "f32"

/**
 * Decoded mono waveform. `samples` hold values in the native units of
 * `sampleFormat` (e.g. -32768..32767 for s16, -1..1 for f32).
 */
export type PcmAudio = {
  sampleRate: number
  sampleFormat: SampleFormat
  samples: Float64Array
}

type SampleFormatInfo = {
  bytes: number
  min: number
  max: number
  integer: boolean
}

const WAVE_FORMAT_PCM = 0x0001
const WAVE_FORMAT_IEEE_FLOAT = 0x0003
const WAVE_FORMAT_EXTENSIBLE = 0xfffe

const SAMPLE_FORMATS: Record<SampleFormat, SampleFormatInfo> = {
  s16: { bytes: 2, min: -32768, max: 32767, integer: true },
  s24: { bytes: 3, min: -8388608, max: 8388607, integer: true },
  s32: { bytes: 4, min: -2147483648, max: 2147483647, integer: true },
  f32: { bytes: 4, min: -1, max: 1, integer: false },
}

export class WavDecodeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "WavDecodeError"
  }
}

type FmtChunk = {
  formatTag: number
  channels: number
  sampleRate: number
  blockAlign: number
  bitsPerSample: number
}

/** Largest positive sample value the format can hold. */
export function fullScale(format: SampleFormat): number {
  return SAMPLE_FORMATS[format].max
}

export function clampSample(value: number, format: SampleFormat): number {
  const info = SAMPLE_FORMATS[format]
  if (!info.integer) {
    return value
  }
  if (value > info.max) return info.max
  if (value < info.min) return info.min
  return value
}

function readChunkHeader(buffer: Buffer, offset: number): { id: string; size: number; dataOffset: number } {
  const id = buffer.toString("ascii", offset, offset + 4)
  const size = buffer.readUInt32LE(offset + 4)
  return { id, size, dataOffset: offset + 8 }
}

function parseFmt(chunk: Buffer): FmtChunk {
  if (chunk.length < 16) {
    throw new WavDecodeError("WAV fmt chunk is truncated.")
  }

  let formatTag = chunk.readUInt16LE(0)
  if (formatTag === WAVE_FORMAT_EXTENSIBLE && chunk.length >= 26) {
    // First two bytes of the SubFormat GUID carry the real format tag.
    formatTag = chunk.readUInt16LE(24)
  }

  return {
    formatTag,
    channels: chunk.readUInt16LE(2),
    sampleRate: chunk.readUInt32LE(4),
    blockAlign: chunk.readUInt16LE(12),
    bitsPerSample: chunk.readUInt16LE(14),
  }
}

function resolveSampleFormat(fmt: FmtChunk): SampleFormat {
  if (fmt.formatTag === WAVE_FORMAT_PCM) {
    switch (fmt.bitsPerSample) {
      case 16:
        return "s16"
      case 24:
        return "s24"
      case 32:
        return "s32"
    }
  }
  if (fmt.formatTag === WAVE_FORMAT_IEEE_FLOAT && fmt.bitsPerSample === 32) {
    return "f32"
  }
  throw new WavDecodeError(
    `Unsupported WAV encoding (format tag ${fmt.formatTag}, ${fmt.bitsPerSample} bits).`,
  )
}

function readSample(buffer: Buffer, offset: number, format: SampleFormat): number {
  switch (format) {
    case "s16":
      return buffer.readInt16LE(offset)
    case "s24":
      return buffer.readIntLE(offset, 3)
    case "s32":
      return buffer.readInt32LE(offset)
    case "f32":
      return buffer.readFloatLE(offset)
  }
}

function writeSample(buffer: Buffer, offset: number, value: number, format: SampleFormat): void {
  switch (format) {
    case "s16":
      buffer.writeInt16LE(Math.round(clampSample(value, format)), offset)
      return
    case "s24":
      buffer.writeIntLE(Math.round(clampSample(value, format)), offset, 3)
      return
    case "s32":
      buffer.writeInt32LE(Math.round(clampSample(value, format)), offset)
      return
    case "f32":
      buffer.writeFloatLE(value, offset)
      return
  }
}

/**
 * Decodes a RIFF/WAVE payload into mono PCM. Multi-channel input is downmixed by
 * averaging the channels of each frame.
 */
export function decodeWav(buffer: Buffer): PcmAudio {
  if (buffer.length < 12) {
    throw new WavDecodeError("Audio payload is too short to be a WAV file.")
  }
  if (buffer.toString("ascii", 0, 4) !== "RIFF" || buffer.toString("ascii", 8, 12) !== "WAVE") {
    throw new WavDecodeError("Audio payload is not a RIFF/WAVE file.")
  }

  let offset = 12
  let fmt: FmtChunk | null = null
  let data: Buffer | null = null

  while (offset + 8 <= buffer.length) {
    const chunk = readChunkHeader(buffer, offset)
    // Streaming encoders often leave the data size unset; clamp to what arrived.
    const end = Math.min(chunk.dataOffset + chunk.size, buffer.length)

    if (chunk.id === "fmt ") {
      fmt = parseFmt(buffer.subarray(chunk.dataOffset, end))
    } else if (chunk.id === "data") {
      data = buffer.subarray(chunk.dataOffset, end)
    }
    // fmt may follow data.
    if (fmt && data) {
      break
    }

    offset = end + (chunk.size % 2)
  }

  if (!fmt) {
    throw new WavDecodeError("WAV payload is missing its fmt chunk.")
  }
  if (!data) {
    throw new WavDecodeError("WAV payload is missing its data chunk.")
  }
  if (fmt.channels < 1 || fmt.sampleRate < 1) {
    throw new WavDecodeError("WAV fmt chunk declares no channels or no sample rate.")
  }

  const sampleFormat = resolveSampleFormat(fmt)
  const bytesPerSample = SAMPLE_FORMATS[sampleFormat].bytes
  const frameSize = Math.max(fmt.blockAlign, bytesPerSample * fmt.channels)
  const frameCount = Math.floor(data.length / frameSize)
  const samples = new Float64Array(frameCount)

  for (let frame = 0; frame < frameCount; frame++) {
    const frameOffset = frame * frameSize
    let sum = 0
    for (let channel = 0; channel < fmt.channels; channel++) {
      sum += readSample(data, frameOffset + channel * bytesPerSample, sampleFormat)
    }
    samples[frame] = sum / fmt.channels
  }

  return {
    sampleRate: fmt.sampleRate,
    sampleFormat,
    samples,
  }
}

export function encodeWav(audio: PcmAudio): Buffer {
  const info = SAMPLE_FORMATS[audio.sampleFormat]
  const dataSize = audio.samples.length * info.bytes
  const output = Buffer.alloc(44 + dataSize)

  output.write("RIFF", 0, "ascii")
  output.writeUInt32LE(36 + dataSize, 4)
  output.write("WAVE", 8, "ascii")
  output.write("fmt ", 12, "ascii")
  output.writeUInt32LE(16, 16)
  output.writeUInt16LE(info.integer ? WAVE_FORMAT_PCM : WAVE_FORMAT_IEEE_FLOAT, 20)
  output.writeUInt16LE(1, 22)
  output.writeUInt32LE(audio.sampleRate, 24)
  output.writeUInt32LE(audio.sampleRate * info.bytes, 28)
  output.writeUInt16LE(info.bytes, 32)
  output.writeUInt16LE(info.bytes * 8, 34)
  output.write("data", 36, "ascii")
  output.writeUInt32LE(dataSize, 40)

  for (let i = 0; i < audio.samples.length; i++) {
    writeSample(output, 44 + i * info.bytes, audio.samples[i], audio.sampleFormat)
  }

  return output
}

/**
 * Wraps raw little-endian 16-bit mono PCM (as streamed by cloud APIs) in a WAV header.
 */
export function wrapPcm16(pcm: Buffer, sampleRate: number): Buffer {
  const frameCount = Math.floor(pcm.length / 2)
  const samples = new Float64Array(frameCount)
  for (let i = 0; i < frameCount; i++) {
    samples[i] = pcm.readInt16LE(i * 2)
  }
  return encodeWav({ sampleRate, sampleFormat: "s16", samples })
}

export function durationMs(audio: PcmAudio): number {
  return (audio.samples.length / audio.sampleRate) * 1000
}
